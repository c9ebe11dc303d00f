/**
 * Type guards for engine errors and code-level discrimination.
 */

import type { FaultmapError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { ConfigurationError, CycleError } from "./engine.js";

/**
 * Check if an error is one of the two kinds the exception engine lets
 * propagate to its caller instead of dispatching.
 */
export function isEngineError(error: unknown): error is ConfigurationError | CycleError {
  return error instanceof ConfigurationError || error instanceof CycleError;
}

/**
 * Check if a FaultmapError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: FaultmapError,
  code: C,
): error is FaultmapError & { readonly code: C } {
  return error.code === code;
}
