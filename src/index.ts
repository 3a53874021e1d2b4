// =============================================================================
// Public API
// =============================================================================

// Data model
export {
  DomainHost,
  DomainName,
  HostAddr,
  IpAddress,
  IpHost,
  Port,
  formatIp,
  type IpFamily
} from "./domain/HostAddr.js"
export { SocketAddr, formatSocketAddr } from "./domain/SocketAddr.js"
export {
  NetworkSchemes,
  PathSchemes,
  isNetworkScheme,
  type NetworkScheme,
  type NetworkTag,
  type PathScheme,
  type PathTag,
  type Scheme
} from "./domain/Scheme.js"
export {
  Endpoint,
  NetworkEndpoint,
  PathEndpoint,
  isNetworkEndpoint,
  isPathEndpoint,
  schemeOf,
  type EndpointTag
} from "./domain/Endpoint.js"
export {
  InvalidAddress,
  InvalidAddressReason,
  InvalidScheme,
  NO_SOCKET_ADDR,
  type ParseEndpointError
} from "./domain/ParseEndpointError.js"

// Operations
export { parse, parseSync } from "./domain/parse.js"
export { format, formatHost } from "./domain/format.js"
export { resolve } from "./resolve.js"

// Name lookup
export {
  HostResolver,
  type HostLookupError,
  type HostResolverInterface
} from "./HostResolver.js"
export {
  DnsHostResolverLive,
  makeDnsHostResolver,
  type LookupAll
} from "./infrastructure/DnsHostResolver.js"
export {
  makeStaticHostResolver,
  makeStaticHostResolverLayer,
  type HostTable,
  type StaticHostResolver
} from "./infrastructure/StaticHostResolver.js"

// Schema & Config integration
export { EndpointFromString } from "./EndpointFromString.js"
export { endpointConfig, networkEndpointConfig } from "./EndpointConfig.js"
