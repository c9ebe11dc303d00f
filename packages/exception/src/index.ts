/**
 * @faultmap/exception
 *
 * Maps errors raised inside an interceptor chain to HTTP responses.
 *
 * Lookup order for a raised error:
 * 1. handler registered for the error's tag
 * 2. handler registered for the error's class
 * 3. handler registered for the nearest ancestor of the tag
 * 4. handler registered for the nearest superclass
 * 5. the `default` handler
 */

export const PACKAGE_NAME = "@faultmap/exception" as const;

// Constants
export {
  DECODE_TAG,
  HANDLE_SPAN_NAME,
  INTERCEPTOR_NAME,
  REQUEST_COERCION_TAG,
  RESPONSE_COERCION_TAG,
  RESPONSE_TAG,
  TRACER_NAME,
} from "./constants.js";
// Dispatch
export {
  createDispatcher,
  type Dispatcher,
  dispatch,
  RESOLUTION_ORDER,
  resolveHandler,
} from "./dispatch.js";
// Built-in error kinds
export {
  CoercionError,
  type CoercionErrorData,
  type CoercionScope,
  DecodeError,
  type DecodeErrorData,
  HttpResponseError,
  type HttpResponseErrorData,
} from "./errors.js";
// Handlers
export {
  type CoercionEncoder,
  createCoercionHandler,
  DEFAULT_HANDLERS,
  defaultHandler,
  encodeCoercionError,
  httpResponseHandler,
  requestParsingHandler,
} from "./handlers.js";
// Interceptor
export {
  createExceptionInterceptor,
  type ExceptionInterceptor,
  type ExceptionInterceptorOptions,
  type ThrownContext,
} from "./interceptor.js";
// Registry
export { createHandlerRegistry, HandlerRegistry } from "./registry.js";
// Hierarchies
export { TagHierarchy } from "./tag-hierarchy.js";
export { isErrorClass, superTypes, typeName, typeOf } from "./type-hierarchy.js";
// Types
export type {
  DispatchOutcome,
  ErrorClass,
  ErrorTag,
  ExceptionHandler,
  HandlerTable,
  HandlerWrap,
  Identifier,
  MatchStrategy,
  Resolution,
} from "./types.js";
// Wraps
export { composeWraps } from "./wraps/compose.js";
export {
  type ConsoleLoggingWrapOptions,
  createConsoleLoggingWrap,
  type OutputSink,
  wrapLogToConsole,
} from "./wraps/console.js";
export { createTracingWrap, type TracingWrapOptions } from "./wraps/tracing.js";
