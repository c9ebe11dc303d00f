import type { HttpRequest, HttpResponse } from "./http-types.js";

/**
 * Context threaded through every stage of an interceptor chain.
 *
 * At most one of `response` and `error` is set. Use {@link withResponse}
 * and {@link withError} to move between the two instead of spreading.
 */
export interface InterceptorContext<Req extends HttpRequest = HttpRequest> {
  readonly request: Req;
  readonly response?: HttpResponse;
  readonly error?: Error;
}

/** A single interceptor stage; may complete synchronously */
export type InterceptorStage = (
  context: InterceptorContext,
) => InterceptorContext | Promise<InterceptorContext>;

/**
 * Interceptor: enter, leave and error stages around a request handler
 *
 * All stages are optional. `enter` runs on the way in, `leave` on the way
 * out in reverse order, and `error` in reverse order once any stage fails.
 * An `error` stage either resolves the failure (returns a context with a
 * `response`) or hands a replacement `error` to the next outer interceptor.
 */
export interface Interceptor {
  /** Unique interceptor name */
  readonly name: string;

  enter?: InterceptorStage;

  leave?: InterceptorStage;

  error?: InterceptorStage;
}

/**
 * Return a context carrying `response` and no error
 */
export function withResponse<Req extends HttpRequest>(
  context: InterceptorContext<Req>,
  response: HttpResponse,
): InterceptorContext<Req> {
  return { request: context.request, response };
}

/**
 * Return a context carrying `error` and no response
 */
export function withError<Req extends HttpRequest>(
  context: InterceptorContext<Req>,
  error: Error,
): InterceptorContext<Req> {
  return { request: context.request, error };
}
