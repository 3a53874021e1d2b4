// =============================================================================
// StaticHostResolver — In-Memory Adapter
// =============================================================================
//
// A HostResolver backed by a fixed table. For tests and offline use: no
// network, deterministic answers.
//
//   - known name   → the table's addresses, in table order
//   - unknown name → HostLookupError
//
// Every name asked for is recorded, so tests can assert whether a lookup
// happened at all (IP hosts must never reach the resolver).
//
import { Effect, Layer } from "effect"
import { IpAddress, type DomainName } from "../domain/HostAddr.js"
import {
  HostResolver,
  type HostLookupError,
  type HostResolverInterface
} from "../HostResolver.js"

export type HostTable = Readonly<Record<string, ReadonlyArray<string>>>

export interface StaticHostResolver {
  readonly service: HostResolverInterface
  readonly getLookups: () => ReadonlyArray<DomainName>
  readonly clear: () => void
}

export const makeStaticHostResolver = (table: HostTable): StaticHostResolver => {
  // Validated once, up front: a bad fixture fails at construction.
  const entries = new Map(
    Object.entries(table).map(([name, ips]) => [name, ips.map(IpAddress.make)] as const)
  )
  const lookups: DomainName[] = []

  const service: HostResolverInterface = {
    lookup: (domain: DomainName) =>
      Effect.suspend(() => {
        lookups.push(domain)
        const ips = entries.get(domain)
        return ips === undefined
          ? Effect.fail<HostLookupError>({ _tag: "HostLookupError", domain })
          : Effect.succeed(ips)
      })
  }

  return {
    service,
    getLookups: () => [...lookups],
    clear: () => {
      lookups.length = 0
    }
  }
}

export const makeStaticHostResolverLayer = (
  table: HostTable
): {
  layer: Layer.Layer<HostResolver>
  getLookups: () => ReadonlyArray<DomainName>
} => {
  const resolver = makeStaticHostResolver(table)
  return {
    layer: Layer.succeed(HostResolver, resolver.service),
    getLookups: resolver.getLookups
  }
}
