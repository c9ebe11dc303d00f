/**
 * Tags of the built-in error kinds handled by {@link DEFAULT_HANDLERS}.
 * Namespaced by the collaborator that raises them.
 */
export const RESPONSE_TAG = "faultmap.http/response" as const;
export const DECODE_TAG = "faultmap.format/decode" as const;
export const REQUEST_COERCION_TAG = "faultmap.coercion/request" as const;
export const RESPONSE_COERCION_TAG = "faultmap.coercion/response" as const;

/** Name of the interceptor returned by createExceptionInterceptor() */
export const INTERCEPTOR_NAME = "faultmap/exception" as const;

export const TRACER_NAME = "faultmap" as const;

/** Span opened around every handler invocation by the tracing wrap */
export const HANDLE_SPAN_NAME = "faultmap.exception.handle" as const;
