import { Schema } from "effect"
import { HostAddr, Port } from "./HostAddr.js"
import {
  NetworkSchemes,
  PathSchemes,
  pathSchemeByTag,
  schemeByTag,
  type NetworkScheme,
  type PathTag,
  type Scheme
} from "./Scheme.js"

// =============================================================================
// Endpoint
// =============================================================================
//
// Closed union, one variant per scheme:
//   - 13 network variants, each { host, port }
//   - 2 path variants (Unix, File), each { path }
//
// A network variant can't exist without a host and a port; a path variant
// can't carry either. Values are plain readonly data, built in one step.
//

// -----------------------------------------------------------------------------
// Factory: network variant schema
// -----------------------------------------------------------------------------
//
// TS SYNTAX: `<Tag extends string>` infers the literal ("Http"), so each call
// yields a differently-typed Struct with `_tag: "Http"`, `_tag: "Tcp"`, ...
//
const makeNetworkVariant = <Tag extends string>(tag: Tag) =>
  Schema.Struct({
    _tag: Schema.Literal(tag),
    host: HostAddr.schema,
    port: Port
  })

export const Http = makeNetworkVariant(NetworkSchemes.http.tag)
export const Https = makeNetworkVariant(NetworkSchemes.https.tag)
export const Tcp = makeNetworkVariant(NetworkSchemes.tcp.tag)
export const Udp = makeNetworkVariant(NetworkSchemes.udp.tag)
export const Mqtt = makeNetworkVariant(NetworkSchemes.mqtt.tag)
export const Mqtts = makeNetworkVariant(NetworkSchemes.mqtts.tag)
export const Ws = makeNetworkVariant(NetworkSchemes.ws.tag)
export const Wss = makeNetworkVariant(NetworkSchemes.wss.tag)
export const Coap = makeNetworkVariant(NetworkSchemes.coap.tag)
export const Coaps = makeNetworkVariant(NetworkSchemes.coaps.tag)
export const Redis = makeNetworkVariant(NetworkSchemes.redis.tag)
export const Amqp = makeNetworkVariant(NetworkSchemes.amqp.tag)
export const Ftp = makeNetworkVariant(NetworkSchemes.ftp.tag)

const makePathVariant = <Tag extends string>(tag: Tag) =>
  Schema.Struct({
    _tag: Schema.Literal(tag),
    path: Schema.String
  })

export const Unix = makePathVariant(PathSchemes.unix.tag)
export const File = makePathVariant(PathSchemes.file.tag)

// -----------------------------------------------------------------------------
// Unions
// -----------------------------------------------------------------------------

export const NetworkEndpoint = Schema.Union(
  Http, Https, Tcp, Udp, Mqtt, Mqtts, Ws, Wss, Coap, Coaps, Redis, Amqp, Ftp
)
export type NetworkEndpoint = typeof NetworkEndpoint.Type

export const PathEndpoint = Schema.Union(Unix, File)
export type PathEndpoint = typeof PathEndpoint.Type

const EndpointSchema = Schema.Union(NetworkEndpoint, PathEndpoint)
export type Endpoint = typeof EndpointSchema.Type

export type EndpointTag = Endpoint["_tag"]

// -----------------------------------------------------------------------------
// Guards & accessors
// -----------------------------------------------------------------------------

const isPathTag = (tag: EndpointTag): tag is PathTag =>
  Object.hasOwn(pathSchemeByTag, tag)

export const isPathEndpoint = (endpoint: Endpoint): endpoint is PathEndpoint =>
  isPathTag(endpoint._tag)

export const isNetworkEndpoint = (endpoint: Endpoint): endpoint is NetworkEndpoint =>
  !isPathEndpoint(endpoint)

export const schemeOf = (endpoint: Endpoint): Scheme =>
  isPathEndpoint(endpoint)
    ? pathSchemeByTag[endpoint._tag]
    : schemeByTag[endpoint._tag]

// =============================================================================
// Companion object
// =============================================================================
//
// Direct construction from already-validated parts. `network` picks the
// variant through the scheme table, same as the parser does.
//

export const Endpoint = {
  schema: EndpointSchema,
  network: (scheme: NetworkScheme, host: HostAddr, port: Port): NetworkEndpoint => ({
    _tag: NetworkSchemes[scheme].tag,
    host,
    port
  }),
  unix: (path: string): PathEndpoint => ({ _tag: "Unix", path }),
  file: (path: string): PathEndpoint => ({ _tag: "File", path })
}
