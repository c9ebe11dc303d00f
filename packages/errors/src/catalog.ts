/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised or encoded by Faultmap packages is declared here
 * together with its HTTP status, domain and base error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * Behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ConflictError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIGURATION ERRORS - Raised while building handler registries and interceptors
  // ============================================================================
  CONFIGURATION_INVALID: {
    domain: "config",
    httpStatus: 500,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid configuration",
    description: "The exception handling configuration is invalid",
  },

  // ============================================================================
  // HIERARCHY ERRORS - Tag derivation graph
  // ============================================================================
  HIERARCHY_CYCLE: {
    domain: "hierarchy",
    httpStatus: 409,
    baseType: "ConflictError" as const,
    isExpected: false,
    title: "Hierarchy cycle",
    description: "The derivation would introduce a cycle into the tag hierarchy",
  },

  // ============================================================================
  // VALIDATION ERRORS - Request and response coercion
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "One or more fields failed validation",
  },
  REQUEST_VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Request validation failed",
    description: "The request did not match the declared schema",
  },
  RESPONSE_VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Response validation failed",
    description: "The handler produced a response that did not match the declared schema",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
