// =============================================================================
// Scheme Table
// =============================================================================
//
// The one place where scheme policy lives:
//   scheme string → Endpoint variant tag
//   scheme string → default port (null = the port is mandatory)
//
// Transport schemes (tcp, udp) have no default: a missing port there is an
// error.
//
// TS SYNTAX: `as const satisfies ...`
// `as const` keeps the literal tags ("Http", ...) and ports (80, 443) as
// types; `satisfies` checks the shape without widening them back.
//

export interface SchemeEntry {
  readonly tag: string
  readonly defaultPort: 80 | 443 | null
}

export const NetworkSchemes = {
  http: { tag: "Http", defaultPort: 80 },
  https: { tag: "Https", defaultPort: 443 },
  tcp: { tag: "Tcp", defaultPort: null },
  udp: { tag: "Udp", defaultPort: null },
  mqtt: { tag: "Mqtt", defaultPort: 80 },
  mqtts: { tag: "Mqtts", defaultPort: 443 },
  ws: { tag: "Ws", defaultPort: 80 },
  wss: { tag: "Wss", defaultPort: 443 },
  coap: { tag: "Coap", defaultPort: 80 },
  coaps: { tag: "Coaps", defaultPort: 443 },
  redis: { tag: "Redis", defaultPort: 80 },
  amqp: { tag: "Amqp", defaultPort: 80 },
  ftp: { tag: "Ftp", defaultPort: 80 }
} as const satisfies Record<string, SchemeEntry>

export type NetworkScheme = keyof typeof NetworkSchemes
export type NetworkTag = (typeof NetworkSchemes)[NetworkScheme]["tag"]

// Path schemes are recognised by raw string prefix, before any URL parsing.
export const PathSchemes = {
  unix: { tag: "Unix", prefix: "unix://" },
  file: { tag: "File", prefix: "file://" }
} as const

export type PathScheme = keyof typeof PathSchemes
export type PathTag = (typeof PathSchemes)[PathScheme]["tag"]

export type Scheme = NetworkScheme | PathScheme

// Exact, case-sensitive lookup. `Object.hasOwn` keeps "constructor" and
// friends from matching through the prototype.
export const isNetworkScheme = (scheme: string): scheme is NetworkScheme =>
  Object.hasOwn(NetworkSchemes, scheme)

// Reverse table: variant tag → scheme. The `Record<NetworkTag, ...>` annotation
// makes a missing variant a compile error.
export const schemeByTag: Record<NetworkTag, NetworkScheme> = {
  Http: "http",
  Https: "https",
  Tcp: "tcp",
  Udp: "udp",
  Mqtt: "mqtt",
  Mqtts: "mqtts",
  Ws: "ws",
  Wss: "wss",
  Coap: "coap",
  Coaps: "coaps",
  Redis: "redis",
  Amqp: "amqp",
  Ftp: "ftp"
}

export const pathSchemeByTag: Record<PathTag, PathScheme> = {
  Unix: "unix",
  File: "file"
}
