import {
  type HttpRequest,
  type HttpResponse,
  type Interceptor,
  type InterceptorContext,
  withError,
  withResponse,
} from "@faultmap/core";
import { ConfigurationError, toError } from "@faultmap/errors";
import { z } from "zod";
import { INTERCEPTOR_NAME } from "./constants.js";
import { createDispatcher, type Dispatcher } from "./dispatch.js";
import { createHandlerRegistry, HandlerRegistry } from "./registry.js";
import { TagHierarchy } from "./tag-hierarchy.js";
import type { HandlerTable } from "./types.js";

export interface ExceptionInterceptorOptions {
  /** Handlers merged over DEFAULT_HANDLERS */
  readonly handlers?: HandlerTable;
  /** Prebuilt registry; takes precedence over `handlers` */
  readonly registry?: HandlerRegistry;
  /** Tag hierarchy consulted for ancestor matches (default: empty) */
  readonly hierarchy?: TagHierarchy;
}

const OptionsSchema = z
  .object({
    handlers: z.record(z.unknown()).optional(),
    registry: z
      .custom<HandlerRegistry>((value) => value instanceof HandlerRegistry, {
        message: "Expected a HandlerRegistry",
      })
      .optional(),
    hierarchy: z
      .custom<TagHierarchy>((value) => value instanceof TagHierarchy, {
        message: "Expected a TagHierarchy",
      })
      .optional(),
  })
  .strict();

/**
 * Context as a host pipeline may hand it to the error stage. The error
 * slot holds whatever was thrown, Error or not.
 */
export interface ThrownContext {
  readonly request: HttpRequest;
  readonly response?: HttpResponse;
  readonly error?: unknown;
}

function isSettled(context: ThrownContext): context is InterceptorContext {
  return context.error === undefined;
}

export interface ExceptionInterceptor extends Interceptor {
  readonly dispatcher: Dispatcher;
  error(context: ThrownContext): InterceptorContext;
}

/**
 * Create an interceptor that turns errors into responses.
 *
 * Its `error` stage normalizes `context.error` to an Error, dispatches it
 * and returns a context with either the resulting `response` or a
 * replacement `error` for the outer interceptors to dispatch again, never
 * both.
 *
 * @example
 * ```typescript
 * const hierarchy = new TagHierarchy()
 *   .derive("app/error", "app/exception")
 *   .freeze();
 *
 * const exceptions = createExceptionInterceptor({
 *   hierarchy,
 *   handlers: {
 *     wrap: wrapLogToConsole,
 *     tags: { "app/exception": (e) => ({ status: 500, body: { message: e.message } }) },
 *     types: [[RangeError, () => ({ status: 422 })]],
 *   },
 * });
 *
 * await executeChain([exceptions], request, handler);
 * ```
 *
 * @throws ConfigurationError if the options or handler table are invalid
 */
export function createExceptionInterceptor(
  options: ExceptionInterceptorOptions = {},
): ExceptionInterceptor {
  const parsed = OptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      "invalid exception interceptor options",
      parsed.error.issues.map((issue) => ({
        field: issue.path.join(".") || "(options)",
        message: issue.message,
        code: issue.code,
      })),
    );
  }

  if (options.registry !== undefined && options.handlers !== undefined) {
    console.warn(`[${INTERCEPTOR_NAME}] both registry and handlers given; handlers are ignored`);
  }

  const registry = options.registry ?? createHandlerRegistry(options.handlers ?? {});
  const dispatcher = createDispatcher({
    registry,
    ...(options.hierarchy ? { hierarchy: options.hierarchy } : {}),
  });

  return {
    name: INTERCEPTOR_NAME,
    dispatcher,

    error(context: ThrownContext): InterceptorContext {
      if (isSettled(context)) {
        return context;
      }
      const base: InterceptorContext = { request: context.request };
      const outcome = dispatcher.dispatch(toError(context.error), context.request);
      return outcome.kind === "response"
        ? withResponse(base, outcome.response)
        : withError(base, outcome.error);
    },
  };
}
