// =============================================================================
// HostResolver — The Port (Interface)
// =============================================================================
//
// HEXAGONAL ARCHITECTURE:
// `resolve` needs ONE capability from the outside world: turn a domain name
// into IP addresses. This file defines that capability; the adapters
// (DNS, static table) live in infrastructure/.
//
// EFFECT SERVICE PATTERN:
//   1. Interface describing the operation
//   2. Context.Tag for dependency injection
//   3. Consumers use `yield* HostResolver` in Effect generators
//
import { Context, Effect } from "effect"
import type { DomainName, IpAddress } from "./domain/HostAddr.js"

// =============================================================================
// HostResolver Errors
// =============================================================================

export type HostLookupError = {
  readonly _tag: "HostLookupError"
  readonly domain: DomainName
  readonly cause?: unknown
}

// =============================================================================
// HostResolver Interface
// =============================================================================

export interface HostResolverInterface {
  /**
   * Look up every address of a domain name.
   *
   * Returns the addresses in the order the lookup produced them: no sorting,
   * no de-duplication.
   */
  readonly lookup: (
    domain: DomainName
  ) => Effect.Effect<ReadonlyArray<IpAddress>, HostLookupError>
}

// =============================================================================
// HostResolver Tag
// =============================================================================

export class HostResolver extends Context.Tag("HostResolver")<
  HostResolver,
  HostResolverInterface
>() {}
