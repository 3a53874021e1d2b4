// =============================================================================
// HostResolver adapters
// =============================================================================
//
//   1. StaticHostResolver — table-backed, used by the resolve tests
//   2. DnsHostResolver    — node:dns; exercised with IP literals only, which
//                           node:dns answers without asking any server, and
//                           with a stand-in lookup for the failure path
//
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { DomainName } from "../../src/domain/HostAddr.js"
import { HostResolver } from "../../src/HostResolver.js"
import { DnsHostResolverLive, makeDnsHostResolver } from "../../src/infrastructure/DnsHostResolver.js"
import {
  makeStaticHostResolver,
  makeStaticHostResolverLayer
} from "../../src/infrastructure/StaticHostResolver.js"

describe("StaticHostResolver", () => {
  it.effect("known name → table addresses in order", () =>
    Effect.gen(function* () {
      const resolver = makeStaticHostResolver({ "cache.local": ["10.1.0.9", "10.1.0.8"] })

      const ips = yield* resolver.service.lookup(DomainName.make("cache.local"))

      expect(ips).toEqual(["10.1.0.9", "10.1.0.8"])
    })
  )

  it.effect("unknown name → HostLookupError", () =>
    Effect.gen(function* () {
      const resolver = makeStaticHostResolver({})

      const error = yield* Effect.flip(resolver.service.lookup(DomainName.make("missing.local")))

      expect(error).toEqual({ _tag: "HostLookupError", domain: "missing.local" })
    })
  )

  it("records lookups, clear() resets them", () => {
    const resolver = makeStaticHostResolver({ a: ["10.0.0.1"] })
    Effect.runSync(resolver.service.lookup(DomainName.make("a")))
    Effect.runSync(Effect.either(resolver.service.lookup(DomainName.make("b"))))

    expect(resolver.getLookups()).toEqual(["a", "b"])

    resolver.clear()

    expect(resolver.getLookups()).toEqual([])
  })

  it("an invalid address in the table fails at construction", () => {
    expect(() => makeStaticHostResolver({ a: ["not-an-ip"] })).toThrow()
  })

  it.effect("provides HostResolver via Layer", () =>
    Effect.gen(function* () {
      const { layer, getLookups } = makeStaticHostResolverLayer({ "api.local": ["192.0.2.1"] })

      const program = Effect.gen(function* () {
        const resolver = yield* HostResolver
        return yield* resolver.lookup(DomainName.make("api.local"))
      })

      const ips = yield* program.pipe(Effect.provide(layer))

      expect(ips).toEqual(["192.0.2.1"])
      expect(getLookups()).toEqual(["api.local"])
    })
  )
})

describe("DnsHostResolver", () => {
  it.effect("IPv4 literal resolves to itself", () =>
    Effect.gen(function* () {
      const ips = yield* makeDnsHostResolver().lookup(DomainName.make("127.0.0.1"))

      expect(ips).toEqual(["127.0.0.1"])
    })
  )

  it.effect("IPv6 literal resolves to itself, via the Layer", () =>
    Effect.gen(function* () {
      const resolver = yield* HostResolver
      const ips = yield* resolver.lookup(DomainName.make("::1"))

      expect(ips).toEqual(["::1"])
    }).pipe(Effect.provide(DnsHostResolverLive))
  )

  it.effect("a rejected lookup → HostLookupError carrying the cause", () =>
    Effect.gen(function* () {
      const cause = new Error("getaddrinfo ENOTFOUND nowhere.internal")
      const resolver = makeDnsHostResolver(() => Promise.reject(cause))

      const error = yield* Effect.flip(resolver.lookup(DomainName.make("nowhere.internal")))

      expect(error).toEqual({ _tag: "HostLookupError", domain: "nowhere.internal", cause })
    })
  )

  it.effect("addresses come back in the order the lookup gave them", () =>
    Effect.gen(function* () {
      const resolver = makeDnsHostResolver(() =>
        Promise.resolve([{ address: "10.0.0.3" }, { address: "2001:db8::7" }, { address: "10.0.0.3" }])
      )

      const ips = yield* resolver.lookup(DomainName.make("api.internal"))

      expect(ips).toEqual(["10.0.0.3", "2001:db8::7", "10.0.0.3"])
    })
  )
})
