// =============================================================================
// EndpointFromString — Schema Codec
// =============================================================================
//
// string ⇄ Endpoint, built from the parser and the formatter:
//   decode = parse  (ParseEndpointError → ParseResult.Type issue)
//   encode = format (total)
//
// Lets an endpoint sit inside any Schema-decoded payload:
//   Schema.Struct({ broker: EndpointFromString })
//
import { Either, ParseResult, Schema } from "effect"
import { Endpoint } from "./domain/Endpoint.js"
import { format } from "./domain/format.js"
import { parse } from "./domain/parse.js"

export const EndpointFromString = Schema.transformOrFail(
  Schema.String,
  Schema.typeSchema(Endpoint.schema),
  {
    strict: true,
    decode: (input, _options, ast) =>
      parse(input).pipe(
        Either.mapLeft((error) => new ParseResult.Type(ast, input, error.message))
      ),
    encode: (endpoint) => ParseResult.succeed(format(endpoint))
  }
).annotations({ identifier: "EndpointFromString" })
