// =============================================================================
// Endpoint Config
// =============================================================================
//
// ConfigProvider.fromMap stands in for the environment.
//
import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect } from "effect"
import { endpointConfig, networkEndpointConfig } from "../src/EndpointConfig.js"

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("endpointConfig", () => {
  it.effect("reads and parses an endpoint", () =>
    Effect.gen(function* () {
      const broker = yield* endpointConfig("BROKER_URL")

      expect(broker).toEqual({
        _tag: "Mqtt",
        host: { _tag: "Domain", domain: "broker.local" },
        port: 1883
      })
    }).pipe(withEnv([["BROKER_URL", "mqtt://broker.local:1883"]]))
  )

  it.effect("path endpoints are accepted", () =>
    Effect.gen(function* () {
      const socket = yield* endpointConfig("SOCKET")

      expect(socket).toEqual({ _tag: "Unix", path: "/run/app.sock" })
    }).pipe(withEnv([["SOCKET", "unix:///run/app.sock"]]))
  )

  it.effect("an unparsable value is InvalidData with the parse error message", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(endpointConfig("DB_URL"))

      expect(error).toMatchObject({ _op: "InvalidData", message: "invalid address: tcp://db.local" })
    }).pipe(withEnv([["DB_URL", "tcp://db.local"]]))
  )

  it.effect("a missing value is MissingData", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(endpointConfig("DB_URL"))

      expect(error._op).toBe("MissingData")
    }).pipe(withEnv([]))
  )
})

describe("networkEndpointConfig", () => {
  it.effect("accepts network endpoints", () =>
    Effect.gen(function* () {
      const api = yield* networkEndpointConfig("API_URL")

      expect(api).toEqual({
        _tag: "Https",
        host: { _tag: "Ip", ip: "192.0.2.10" },
        port: 443
      })
    }).pipe(withEnv([["API_URL", "https://192.0.2.10"]]))
  )

  it.effect("rejects path endpoints", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(networkEndpointConfig("API_URL"))

      expect(error).toMatchObject({
        _op: "InvalidData",
        message: "expected a network endpoint, got unix:///run/app.sock"
      })
    }).pipe(withEnv([["API_URL", "unix:///run/app.sock"]]))
  )
})
