import { Either } from "effect"

import { Endpoint } from "./Endpoint.js"
import { HostAddr, Port } from "./HostAddr.js"
import {
  InvalidAddress,
  InvalidScheme,
  type InvalidAddressReason,
  type ParseEndpointError
} from "./ParseEndpointError.js"
import { NetworkSchemes, PathSchemes, isNetworkScheme } from "./Scheme.js"

// =============================================================================
// parse: string → Either<Endpoint, ParseEndpointError>
// =============================================================================
//
// Order matters:
//   1. "unix://" / "file://" by raw prefix — the rest is the path, verbatim
//   2. generic URL grammar (WHATWG `URL`) — must parse and must have a host
//   3. host → Ip if it is an IP literal, Domain otherwise
//   4. port → explicit, else the scheme's default, else error
//   5. scheme → variant, else InvalidScheme
//
// Step 4 runs before step 5, so "ftps://h" is an InvalidAddress (no port)
// while "ftps://h:21" is an InvalidScheme.
//

const invalidAddress = (input: string, reason: InvalidAddressReason): InvalidAddress =>
  new InvalidAddress({ detail: input, reason })

const parseUrl = (input: string): Either.Either<URL, InvalidAddress> =>
  Either.try({
    try: () => new URL(input),
    catch: () => invalidAddress(input, "MalformedUrl")
  })

const parseHost = (url: URL, input: string): Either.Either<HostAddr, InvalidAddress> =>
  url.hostname === ""
    ? Either.left(invalidAddress(input, "MissingHost"))
    : Either.right(HostAddr.fromString(url.hostname))

// `URL.port` is "" both when no port is written and when the written port
// equals the URL grammar's own default for a special scheme ("ftp://h:21").
// Either way the table decides, so "ftp://h:21" is port 80.
const parsePort = (
  url: URL,
  scheme: string,
  input: string
): Either.Either<Port, InvalidAddress> => {
  if (url.port !== "") {
    return Either.right(Port.make(Number(url.port)))
  }
  const fallback = isNetworkScheme(scheme) ? NetworkSchemes[scheme].defaultPort : null
  return fallback === null
    ? Either.left(invalidAddress(input, "MissingPort"))
    : Either.right(Port.make(fallback))
}

export const parse = (input: string): Either.Either<Endpoint, ParseEndpointError> => {
  if (input.startsWith(PathSchemes.unix.prefix)) {
    return Either.right(Endpoint.unix(input.slice(PathSchemes.unix.prefix.length)))
  }
  if (input.startsWith(PathSchemes.file.prefix)) {
    return Either.right(Endpoint.file(input.slice(PathSchemes.file.prefix.length)))
  }

  return Either.gen(function* () {
    const url = yield* parseUrl(input)
    const host = yield* parseHost(url, input)
    // URL.protocol keeps the trailing ":"
    const scheme = url.protocol.slice(0, -1)
    const port = yield* parsePort(url, scheme, input)

    if (!isNetworkScheme(scheme)) {
      return yield* Either.left(new InvalidScheme({ scheme }))
    }
    return Endpoint.network(scheme, host, port)
  })
}

// Throwing variant for trusted input (fixtures, constants).
export const parseSync = (input: string): Endpoint =>
  Either.getOrThrowWith(parse(input), (error) => error)
