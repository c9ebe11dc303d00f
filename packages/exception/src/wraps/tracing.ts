/**
 * OpenTelemetry wrap: one span per handler invocation.
 *
 * When no tracer provider is registered the API hands out no-op spans,
 * so the wrap can stay installed with tracing disabled.
 */

import type { HttpResponse } from "@faultmap/core";
import { getErrorMessage, getErrorTag, toError } from "@faultmap/errors";
import { type Attributes, SpanStatusCode, type Tracer, trace } from "@opentelemetry/api";
import { HANDLE_SPAN_NAME, TRACER_NAME } from "../constants.js";
import { typeName, typeOf } from "../type-hierarchy.js";
import type { HandlerWrap } from "../types.js";

export interface TracingWrapOptions {
  /** Tracer to use (default: the global tracer named "faultmap") */
  readonly tracer?: Tracer;
}

/**
 * Create a wrap that records each handler invocation as a span.
 *
 * Attributes: error class and tag, request method and path, and the
 * response status. A replacement error marks the span as re-dispatched.
 */
export function createTracingWrap(options?: TracingWrapOptions): HandlerWrap {
  return (handler, error, request) => {
    const tracer = options?.tracer ?? trace.getTracer(TRACER_NAME);
    const attributes: Attributes = {
      "faultmap.error.class": typeName(typeOf(error)),
      "http.request.method": request.method,
      "url.path": request.uri,
    };
    const tag = getErrorTag(error);
    if (tag !== undefined) {
      attributes["faultmap.error.tag"] = tag;
    }

    const span = tracer.startSpan(HANDLE_SPAN_NAME, { attributes });
    try {
      const result: HttpResponse | Error = handler(error, request);
      if (result instanceof Error) {
        span.setAttribute("faultmap.redispatch", true);
        span.setStatus({ code: SpanStatusCode.ERROR, message: result.message });
      } else {
        span.setAttribute("http.response.status_code", result.status);
        span.setStatus({ code: result.status >= 500 ? SpanStatusCode.ERROR : SpanStatusCode.OK });
      }
      return result;
    } catch (thrown) {
      span.recordException(toError(thrown));
      span.setStatus({ code: SpanStatusCode.ERROR, message: getErrorMessage(thrown) });
      throw thrown;
    } finally {
      span.end();
    }
  };
}
