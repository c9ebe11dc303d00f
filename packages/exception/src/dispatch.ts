import type { HttpRequest, HttpResponse } from "@faultmap/core";
import { getErrorTag, isEngineError, toError } from "@faultmap/errors";
import type { HandlerRegistry } from "./registry.js";
import { TagHierarchy } from "./tag-hierarchy.js";
import { superTypes, typeOf } from "./type-hierarchy.js";
import type {
  DispatchOutcome,
  ErrorClass,
  ErrorTag,
  ExceptionHandler,
  Identifier,
  MatchStrategy,
  Resolution,
} from "./types.js";

// ---------------------------------------------------------------------------
// Resolution strategies
// ---------------------------------------------------------------------------

interface ResolutionInput {
  readonly registry: HandlerRegistry;
  readonly hierarchy: TagHierarchy;
  readonly tag: ErrorTag | undefined;
  readonly type: ErrorClass | undefined;
}

interface ResolutionStrategy {
  readonly name: Exclude<MatchStrategy, "default">;
  readonly resolve: (input: ResolutionInput) => Resolution | undefined;
}

function firstRegistered(
  registry: HandlerRegistry,
  candidates: Iterable<Identifier>,
  strategy: MatchStrategy,
): Resolution | undefined {
  for (const identifier of candidates) {
    const handler = registry.get(identifier);
    if (handler !== undefined) {
      return { handler, strategy, identifier };
    }
  }
  return undefined;
}

/**
 * Lookup order. The first strategy that yields a registered handler wins;
 * `default` applies when none does.
 */
const STRATEGIES: readonly ResolutionStrategy[] = [
  {
    name: "tag",
    resolve: ({ registry, tag }) =>
      tag === undefined ? undefined : firstRegistered(registry, [tag], "tag"),
  },
  {
    name: "type",
    resolve: ({ registry, type }) =>
      type === undefined ? undefined : firstRegistered(registry, [type], "type"),
  },
  {
    name: "tag-ancestor",
    resolve: ({ registry, hierarchy, tag }) =>
      tag === undefined
        ? undefined
        : firstRegistered(registry, hierarchy.ancestors(tag), "tag-ancestor"),
  },
  {
    name: "type-ancestor",
    resolve: ({ registry, type }) =>
      type === undefined ? undefined : firstRegistered(registry, superTypes(type), "type-ancestor"),
  },
];

/** Strategy names in evaluation order */
export const RESOLUTION_ORDER: readonly MatchStrategy[] = [
  ...STRATEGIES.map((strategy) => strategy.name),
  "default",
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Select the handler for an error:
 * 1. exact tag, 2. exact class, 3. nearest registered ancestor tag,
 * 4. nearest registered superclass, 5. the registry's default handler.
 */
export function resolveHandler(
  registry: HandlerRegistry,
  hierarchy: TagHierarchy,
  error: Error,
): Resolution {
  const input: ResolutionInput = {
    registry,
    hierarchy,
    tag: getErrorTag(error),
    type: typeOf(error),
  };
  for (const strategy of STRATEGIES) {
    const resolution = strategy.resolve(input);
    if (resolution !== undefined) {
      return resolution;
    }
  }
  return { handler: registry.defaultHandler, strategy: "default" };
}

function invoke(
  registry: HandlerRegistry,
  handler: ExceptionHandler,
  error: Error,
  request: HttpRequest,
): HttpResponse | Error {
  const wrap = registry.wrap;
  return wrap !== undefined ? wrap(handler, error, request) : handler(error, request);
}

/**
 * Resolve a handler for `error` and invoke it, through the registry's wrap
 * when one is registered.
 *
 * A handler that returns or throws an Error yields an `error` outcome for
 * the pipeline to dispatch again; this function never loops on its own.
 * Only ConfigurationError and CycleError propagate.
 */
export function dispatch(
  registry: HandlerRegistry,
  hierarchy: TagHierarchy,
  error: Error,
  request: HttpRequest,
): DispatchOutcome {
  const { handler } = resolveHandler(registry, hierarchy, error);
  let result: HttpResponse | Error;
  try {
    result = invoke(registry, handler, error, request);
  } catch (thrown) {
    if (isEngineError(thrown)) {
      throw thrown;
    }
    result = toError(thrown);
  }
  return result instanceof Error
    ? { kind: "error", error: result }
    : { kind: "response", response: result };
}

export interface Dispatcher {
  readonly registry: HandlerRegistry;
  readonly hierarchy: TagHierarchy;
  resolve(error: Error): Resolution;
  dispatch(error: Error, request: HttpRequest): DispatchOutcome;
}

/**
 * Bind a registry and a tag hierarchy into a reusable dispatcher
 */
export function createDispatcher(config: {
  readonly registry: HandlerRegistry;
  readonly hierarchy?: TagHierarchy;
}): Dispatcher {
  const { registry } = config;
  const hierarchy = config.hierarchy ?? new TagHierarchy();
  return {
    registry,
    hierarchy,
    resolve: (error) => resolveHandler(registry, hierarchy, error),
    dispatch: (error, request) => dispatch(registry, hierarchy, error, request),
  };
}
