import { InternalError, toError } from "@faultmap/errors";
import type { HttpRequest, HttpResponse, RequestHandler } from "./http-types.js";
import {
  type Interceptor,
  type InterceptorContext,
  withError,
  withResponse,
} from "./interceptor-types.js";

/**
 * Execute a request through an interceptor chain.
 *
 * Stage order:
 * - `enter` for each interceptor, first to last
 * - the handler
 * - `leave` for each entered interceptor, last to first
 *
 * Any throw switches to the error path, which calls `error` on the entered
 * interceptors from the failing position outwards. An `error` stage that
 * returns a response (and no error) resumes the leave path with the next
 * outer interceptor; one that returns a replacement error keeps the error
 * path going, so outer interceptors dispatch it again.
 *
 * @returns The final response
 * @throws The error left over once every error stage has run
 */
export async function executeChain(
  interceptors: readonly Interceptor[],
  request: HttpRequest,
  handler: RequestHandler,
): Promise<HttpResponse> {
  let context: InterceptorContext = { request };
  const entered: Interceptor[] = [];

  for (const interceptor of interceptors) {
    entered.push(interceptor);
    if (interceptor.enter === undefined) continue;
    try {
      context = await interceptor.enter(context);
    } catch (error) {
      context = withError(context, toError(error));
      break;
    }
    // An enter stage may answer early; skip the rest of the way in.
    if (context.response !== undefined || context.error !== undefined) break;
  }

  if (context.response === undefined && context.error === undefined) {
    try {
      context = withResponse(context, await handler(context.request));
    } catch (error) {
      context = withError(context, toError(error));
    }
  }

  while (entered.length > 0) {
    const interceptor = entered.pop();
    if (interceptor === undefined) break;
    const stage = context.error !== undefined ? interceptor.error : interceptor.leave;
    if (stage === undefined) continue;
    try {
      context = await stage(context);
    } catch (error) {
      context = withError(context, toError(error));
    }
  }

  if (context.error !== undefined) {
    throw context.error;
  }
  if (context.response === undefined) {
    throw new InternalError({
      code: "INTERNAL_ERROR",
      message: `Interceptor chain for ${request.method} ${request.uri} completed without a response`,
    });
  }
  return context.response;
}
