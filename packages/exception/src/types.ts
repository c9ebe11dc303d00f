import type { HttpRequest, HttpResponse } from "@faultmap/core";

/** Symbolic error tag, conventionally namespaced ("app/not-found") */
export type ErrorTag = string;

/** Runtime type of an error value */
export type ErrorClass = abstract new (...args: never[]) => Error;

/** Key of a handler registry entry */
export type Identifier = ErrorTag | ErrorClass;

/**
 * Converts an error into a response. Returning an Error instead asks the
 * enclosing pipeline to dispatch that error again.
 */
export type ExceptionHandler = (error: Error, request: HttpRequest) => HttpResponse | Error;

/**
 * Indirection around every handler invocation. Receives the already
 * resolved handler and may call it any number of times, including zero.
 */
export type HandlerWrap = (
  handler: ExceptionHandler,
  error: Error,
  request: HttpRequest,
) => HttpResponse | Error;

/**
 * One layer of handler configuration. Tables are merged left to right.
 *
 * `default` and `wrap` are the two reserved entries; `tags` and `types`
 * hold the handlers keyed by identifier.
 */
export interface HandlerTable {
  readonly default?: ExceptionHandler | undefined;
  readonly wrap?: HandlerWrap | undefined;
  readonly tags?: Readonly<Record<ErrorTag, ExceptionHandler>> | undefined;
  readonly types?: readonly (readonly [ErrorClass, ExceptionHandler])[] | undefined;
}

/** Which resolution step selected the handler */
export type MatchStrategy = "tag" | "type" | "tag-ancestor" | "type-ancestor" | "default";

export interface Resolution {
  readonly handler: ExceptionHandler;
  readonly strategy: MatchStrategy;
  /** Registry key that matched; absent for the default handler */
  readonly identifier?: Identifier;
}

/**
 * Result of dispatching one error: a terminal response, or a replacement
 * error that the pipeline must dispatch again.
 */
export type DispatchOutcome =
  | { readonly kind: "response"; readonly response: HttpResponse }
  | { readonly kind: "error"; readonly error: Error };
