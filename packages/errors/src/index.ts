/**
 * @faultmap/errors
 *
 * Error taxonomy shared by the Faultmap packages.
 *
 * Library failures extend FaultmapError and carry a `.code` from the
 * catalog. Application errors flowing through a pipeline are usually
 * TaggedErrors: their payload's `type` is the tag the exception engine
 * dispatches on.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, FaultmapError, isError, isFaultmapError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export { getErrorMessage, toError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ConflictError, InternalError, ValidationError } from "./bases/index.js";

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export { ConfigurationError, CycleError } from "./engine.js";

// ============================================================================
// TAGGED ERRORS
// ============================================================================

export { type ErrorData, getErrorData, getErrorTag, TaggedError } from "./tagged.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type { FaultmapErrorOptions, ValidationIssue } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isEngineError } from "./guards.js";

// ============================================================================
// WIRE FORMATS
// ============================================================================

export { type ProblemDetails, ProblemDetailsSchema, ValidationIssueSchema } from "./wire/rfc9457.js";

// ============================================================================
// SERIALIZATION
// ============================================================================

export { problemDetailsFor, safeParseProblemDetails, serializeToRFC9457 } from "./serialization.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@faultmap/errors";
export const PACKAGE_VERSION = "0.1.0";
