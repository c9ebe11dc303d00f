import type { HandlerWrap } from "../types.js";

/**
 * Combine wraps into one. The first wrap is outermost: it sees the call
 * first and receives a handler that runs the remaining wraps around the
 * resolved handler.
 */
export function composeWraps(...wraps: readonly HandlerWrap[]): HandlerWrap {
  return (handler, error, request) => {
    const chained = wraps.reduceRight<typeof handler>(
      (inner, wrap) => (innerError, innerRequest) => wrap(inner, innerError, innerRequest),
      handler,
    );
    return chained(error, request);
  };
}
