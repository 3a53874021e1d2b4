import { Effect, Match } from "effect"

import type { Endpoint, NetworkEndpoint } from "./domain/Endpoint.js"
import {
  InvalidAddress,
  NO_SOCKET_ADDR
} from "./domain/ParseEndpointError.js"
import type { SocketAddr } from "./domain/SocketAddr.js"
import { HostResolver } from "./HostResolver.js"

// =============================================================================
// resolve: Endpoint → Effect<SocketAddr[], InvalidAddress, HostResolver>
// =============================================================================
//
//   - IP host     → [ip:port], no lookup
//   - domain host → HostResolver.lookup, each address paired with the port,
//                   in lookup order
//   - Unix / File → InvalidAddress("No SocketAddr available")
//
// No retry, no timeout. Callers wrap with Effect.retry / Effect.timeout.
//

const resolveNetwork = (
  endpoint: NetworkEndpoint
): Effect.Effect<ReadonlyArray<SocketAddr>, InvalidAddress, HostResolver> => {
  const { host, port } = endpoint
  if (host._tag === "Ip") {
    return Effect.succeed([{ ip: host.ip, port }])
  }

  return Effect.gen(function* () {
    const resolver = yield* HostResolver
    const ips = yield* resolver.lookup(host.domain).pipe(
      Effect.mapError(
        (error) => new InvalidAddress({ detail: error.domain, reason: "LookupFailed" })
      )
    )
    yield* Effect.logDebug(`resolved ${host.domain} to ${ips.length} address(es)`)
    return ips.map((ip): SocketAddr => ({ ip, port }))
  }).pipe(Effect.annotateLogs({ endpoint: endpoint._tag, domain: host.domain, port }))
}

const notResolvable = Effect.fail(
  new InvalidAddress({ detail: NO_SOCKET_ADDR, reason: "NotResolvable" })
)

export const resolve = (
  endpoint: Endpoint
): Effect.Effect<ReadonlyArray<SocketAddr>, InvalidAddress, HostResolver> =>
  Match.value(endpoint).pipe(
    Match.tag("Unix", () => notResolvable),
    Match.tag("File", () => notResolvable),
    Match.orElse(resolveNetwork)
  )
