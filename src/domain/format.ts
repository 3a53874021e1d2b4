import { Match } from "effect"

import type { Endpoint, NetworkEndpoint, PathEndpoint } from "./Endpoint.js"
import { formatIp, type HostAddr } from "./HostAddr.js"
import { pathSchemeByTag, schemeByTag } from "./Scheme.js"

// =============================================================================
// format: Endpoint → canonical string
// =============================================================================
//
// Total. The output always re-parses to an equal Endpoint:
//   - network: "<scheme>://<host>:<port>" — the port is always written, so a
//     default-filled port becomes explicit
//   - path:    "unix://<path>" / "file://<path>", path verbatim
//

export const formatHost = (host: HostAddr): string =>
  Match.value(host).pipe(
    Match.tag("Ip", ({ ip }) => formatIp(ip)),
    Match.tag("Domain", ({ domain }) => domain),
    Match.exhaustive
  )

const formatNetwork = (endpoint: NetworkEndpoint): string =>
  `${schemeByTag[endpoint._tag]}://${formatHost(endpoint.host)}:${endpoint.port}`

const formatPath = (endpoint: PathEndpoint): string =>
  `${pathSchemeByTag[endpoint._tag]}://${endpoint.path}`

// Match.tagsExhaustive: adding a variant to Endpoint without a line here is a
// compile error.
export const format = (endpoint: Endpoint): string =>
  Match.value(endpoint).pipe(
    Match.tagsExhaustive({
      Http: formatNetwork,
      Https: formatNetwork,
      Tcp: formatNetwork,
      Udp: formatNetwork,
      Mqtt: formatNetwork,
      Mqtts: formatNetwork,
      Ws: formatNetwork,
      Wss: formatNetwork,
      Coap: formatNetwork,
      Coaps: formatNetwork,
      Redis: formatNetwork,
      Amqp: formatNetwork,
      Ftp: formatNetwork,
      Unix: formatPath,
      File: formatPath
    })
  )
