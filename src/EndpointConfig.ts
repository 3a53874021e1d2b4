// =============================================================================
// Endpoint Config
// =============================================================================
//
// Read endpoints through Effect's Config, so they come from whatever
// ConfigProvider is installed (environment variables by default):
//
//   const broker = yield* endpointConfig("BROKER_URL")
//
// A string that doesn't parse is a ConfigError.InvalidData carrying the
// ParseEndpointError message.
//
import { Config, ConfigError, Either } from "effect"
import { isNetworkEndpoint, type Endpoint, type NetworkEndpoint } from "./domain/Endpoint.js"
import { format } from "./domain/format.js"
import { parse } from "./domain/parse.js"

export const endpointConfig = (name: string): Config.Config<Endpoint> =>
  Config.string(name).pipe(
    Config.mapOrFail((raw) =>
      parse(raw).pipe(
        Either.mapLeft((error) => ConfigError.InvalidData([], error.message))
      )
    )
  )

// Same, but a unix:// or file:// value is rejected.
export const networkEndpointConfig = (name: string): Config.Config<NetworkEndpoint> =>
  endpointConfig(name).pipe(
    Config.mapOrFail((endpoint): Either.Either<NetworkEndpoint, ConfigError.ConfigError> =>
      isNetworkEndpoint(endpoint)
        ? Either.right(endpoint)
        : Either.left(
          ConfigError.InvalidData([], `expected a network endpoint, got ${format(endpoint)}`)
        )
    )
  )
