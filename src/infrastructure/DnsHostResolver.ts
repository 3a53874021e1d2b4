// =============================================================================
// DnsHostResolver — Adapter Implementation
// =============================================================================
//
// The production adapter of the HostResolver port: the platform resolver
// (`getaddrinfo` through node:dns), so /etc/hosts and the system's resolver
// configuration apply, same as for any socket connect.
//
// `{ all: true }` returns every address; Node 20 returns them in resolver
// order (verbatim), which is the order we hand back.
//
import { lookup } from "node:dns/promises"
import { Effect, Layer } from "effect"
import { IpAddress, type DomainName } from "../domain/HostAddr.js"
import {
  HostResolver,
  type HostLookupError,
  type HostResolverInterface
} from "../HostResolver.js"

// The underlying lookup, replaceable so the adapter can run without a
// resolver behind it.
export type LookupAll = (hostname: string) => Promise<ReadonlyArray<{ readonly address: string }>>

const lookupAll: LookupAll = (hostname) => lookup(hostname, { all: true })

export const makeDnsHostResolver = (lookupFn: LookupAll = lookupAll): HostResolverInterface => ({
  lookup: (domain: DomainName) =>
    Effect.tryPromise({
      try: () => lookupFn(domain),
      catch: (cause): HostLookupError => ({ _tag: "HostLookupError", domain, cause })
    }).pipe(
      Effect.map((addresses) => addresses.map(({ address }) => IpAddress.make(address))),
      Effect.tap((ips) => Effect.logDebug(`dns lookup ${domain} → ${ips.join(", ")}`)),
      Effect.tapError((error) =>
        Effect.logWarning(`dns lookup failed for ${error.domain}`, error.cause)
      )
    )
})

// Layer for DI
export const DnsHostResolverLive = Layer.succeed(HostResolver, makeDnsHostResolver())
