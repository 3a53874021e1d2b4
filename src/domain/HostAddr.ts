// =============================================================================
// HostAddr — Value Object
// =============================================================================
//
// A host is either a literal IP address or a domain name that still needs a
// lookup. Two-case union, no network capability attached: the Formatter and
// the Resolver both consume it as plain data.
//
import { isIP } from "node:net"
import { Schema } from "effect"

// =============================================================================
// IpAddress (branded)
// =============================================================================
//
// Canonical text of an IPv4 or IPv6 address. IPv6 is stored WITHOUT the
// surrounding brackets; brackets only exist in the string forms (URL host,
// socket address).
//

const IpAddressSchema = Schema.String.pipe(
  Schema.filter((s) => isIP(s) !== 0, {
    message: () => "Invalid IP address"
  }),
  Schema.brand("IpAddress")
)

export type IpAddress = typeof IpAddressSchema.Type

export type IpFamily = 4 | 6

// IPv6 text goes through the URL host serializer so that "0:0::1" and "::1"
// end up as the same value, the one the parser produces. Text the URL host
// grammar rejects (zone ids) is kept as is.
const canonicalIpText = (text: string): string => {
  const asUrl = `tcp://[${text}]`
  return isIP(text) === 6 && URL.canParse(asUrl) ? new URL(asUrl).hostname.slice(1, -1) : text
}

export const IpAddress = {
  schema: IpAddressSchema,
  // Smart constructor: throws on invalid input
  make: (text: string): IpAddress =>
    Schema.decodeSync(IpAddressSchema)(canonicalIpText(text)),
  family: (ip: IpAddress): IpFamily => (isIP(ip) === 6 ? 6 : 4)
}

// =============================================================================
// DomainName (branded)
// =============================================================================
//
// Opaque: non-empty, nothing else checked. Syntax is whatever the URL
// grammar let through.
//

export const DomainName = Schema.String.pipe(
  Schema.minLength(1, { message: () => "Domain name must not be empty" }),
  Schema.brand("DomainName")
)
export type DomainName = typeof DomainName.Type

// =============================================================================
// Port (branded)
// =============================================================================

export const Port = Schema.Int.pipe(
  Schema.between(0, 65535, { message: () => "Port must be an integer in 0..65535" }),
  Schema.brand("Port")
)
export type Port = typeof Port.Type

// =============================================================================
// HostAddr (union)
// =============================================================================

export const IpHost = Schema.Struct({
  _tag: Schema.Literal("Ip"),
  ip: IpAddressSchema
})
export type IpHost = typeof IpHost.Type

export const DomainHost = Schema.Struct({
  _tag: Schema.Literal("Domain"),
  domain: DomainName
})
export type DomainHost = typeof DomainHost.Type

const HostAddrSchema = Schema.Union(IpHost, DomainHost)
export type HostAddr = typeof HostAddrSchema.Type

export const HostAddr = {
  schema: HostAddrSchema,
  ip: (text: string): HostAddr => ({ _tag: "Ip", ip: IpAddress.make(text) }),
  domain: (text: string): HostAddr => ({ _tag: "Domain", domain: DomainName.make(text) }),
  // Host classification: an IP literal wins, anything else is a domain.
  // Accepts bracketed IPv6 ("[::1]") as URL hosts spell it.
  fromString: (text: string): HostAddr => {
    const bare = text.startsWith("[") && text.endsWith("]") ? text.slice(1, -1) : text
    return isIP(bare) !== 0 ? HostAddr.ip(bare) : HostAddr.domain(text)
  }
}

// Host text as it appears in a URL authority / socket address.
export const formatIp = (ip: IpAddress): string =>
  IpAddress.family(ip) === 6 ? `[${ip}]` : ip
