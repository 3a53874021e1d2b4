import { Schema } from "effect"

// =============================================================================
// Endpoint Errors
// =============================================================================
//
// ERRORS AS VALUES:
// The parser returns Left(error), the resolver fails its Effect with one.
// Nothing here is thrown by the library itself, except by the `*Sync`/`make`
// helpers meant for trusted input.
//
// TWO KINDS:
//   - InvalidScheme  — valid URL syntax, scheme not in the table
//   - InvalidAddress — everything else (bad URL, no host, no port where the
//                      scheme has no default, failed lookup, path endpoint)
//
// `reason` on InvalidAddress tells the InvalidAddress cases apart without
// adding a third error kind.
//

export class InvalidScheme extends Schema.TaggedError<InvalidScheme>()(
  "InvalidScheme",
  { scheme: Schema.String }
) {
  get message(): string {
    return "unsupported scheme"
  }
}

export const InvalidAddressReason = Schema.Literal(
  "MalformedUrl",
  "MissingHost",
  "MissingPort",
  "LookupFailed",
  "NotResolvable"
)
export type InvalidAddressReason = typeof InvalidAddressReason.Type

export class InvalidAddress extends Schema.TaggedError<InvalidAddress>()(
  "InvalidAddress",
  {
    detail: Schema.String,
    reason: InvalidAddressReason
  }
) {
  get message(): string {
    return `invalid address: ${this.detail}`
  }
}

export type ParseEndpointError = InvalidScheme | InvalidAddress

export const NO_SOCKET_ADDR = "No SocketAddr available"
