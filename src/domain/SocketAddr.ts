import { Schema } from "effect"
import { IpAddress, Port, formatIp } from "./HostAddr.js"

// =============================================================================
// SocketAddr — what the Resolver hands back
// =============================================================================
//
// A concrete IP + port pair. No domain names here: anything that still needs
// a lookup is a HostAddr, not a SocketAddr.
//

const SocketAddrSchema = Schema.Struct({
  ip: IpAddress.schema,
  port: Port
})
export type SocketAddr = typeof SocketAddrSchema.Type

export const SocketAddr = {
  schema: SocketAddrSchema,
  make: (ip: string, port: number): SocketAddr => ({
    ip: IpAddress.make(ip),
    port: Port.make(port)
  })
}

// "127.0.0.1:9000", "[::1]:9000"
export const formatSocketAddr = (addr: SocketAddr): string =>
  `${formatIp(addr.ip)}:${addr.port}`
