/**
 * RFC 9457 Problem Details bodies, as written by the exception handlers
 * and by serializeToRFC9457.
 * https://www.rfc-editor.org/rfc/rfc9457.html
 */

import { z } from "zod";
import type { ValidationIssue } from "../types.js";

export interface ProblemDetails {
  /** "/errors/<CODE>" */
  type: string;
  /** Catalog title of the code */
  title: string;
  status: number;
  detail?: string | undefined;

  // Extension members, all taken from the catalog or the error instance
  code?: string | undefined;
  domain?: string | undefined;
  /** ISO 8601 */
  timestamp?: string | undefined;
  traceId?: string | undefined;
  metadata?: Record<string, string> | undefined;
  errors?: ValidationIssue[] | undefined;
}

export const ValidationIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
  value: z.unknown().optional(),
});

export const ProblemDetailsSchema = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int().min(100).max(599),
  detail: z.string().optional(),
  code: z.string().optional(),
  domain: z.string().optional(),
  timestamp: z.string().datetime().optional(),
  traceId: z.string().optional(),
  metadata: z.record(z.string()).optional(),
  errors: z.array(ValidationIssueSchema).optional(),
});
