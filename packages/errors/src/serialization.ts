/**
 * Error serialization
 *
 * Converts FaultmapError instances and bare validation issues into
 * RFC 9457 ProblemDetails bodies.
 */

import type { FaultmapError } from "./base.js";
import { ValidationError } from "./bases/validation-error.js";
import { ERROR_CATALOG, type ErrorCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";
import { type ProblemDetails, ProblemDetailsSchema } from "./wire/rfc9457.js";

function copyIssues(issues: readonly ValidationIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    field: issue.field,
    message: issue.message,
    code: issue.code,
    ...(issue.value !== undefined ? { value: issue.value } : {}),
  }));
}

/**
 * Serialize a FaultmapError to RFC 9457 ProblemDetails format.
 * Uses `.code` as the RFC 9457 `type` discriminator.
 */
export function serializeToRFC9457(error: FaultmapError): ProblemDetails {
  const problemDetails: ProblemDetails = {
    type: `/errors/${error.code}`,
    title: ERROR_CATALOG[error.code].title,
    status: error.httpStatus,
    detail: error.message,
    code: error.code,
    domain: error.domain,
    timestamp: error.timestamp.toISOString(),
    traceId: error.traceId,
    metadata: error.metadata,
  };

  if (error instanceof ValidationError && error.issues.length > 0) {
    problemDetails.errors = copyIssues(error.issues);
  }

  return problemDetails;
}

/**
 * Build a ProblemDetails body for a catalog code without an error instance.
 * Status and title come from the catalog unless `status` is given.
 */
export function problemDetailsFor(
  code: ErrorCode,
  issues: readonly ValidationIssue[],
  options?: { detail?: string; status?: number },
): ProblemDetails {
  const entry = ERROR_CATALOG[code];
  const problemDetails: ProblemDetails = {
    type: `/errors/${code}`,
    title: entry.title,
    status: options?.status ?? entry.httpStatus,
    code,
    domain: entry.domain,
  };
  if (options?.detail !== undefined) {
    problemDetails.detail = options.detail;
  }
  if (issues.length > 0) {
    problemDetails.errors = copyIssues(issues);
  }
  return problemDetails;
}

/**
 * Validate an untrusted value against the ProblemDetails schema.
 * Returns undefined when it does not conform.
 */
export function safeParseProblemDetails(raw: unknown): ProblemDetails | undefined {
  const result = ProblemDetailsSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}
