import type { HttpRequest } from "@faultmap/core";
import { TaggedError } from "@faultmap/errors";
import type { ExceptionHandler } from "../types.js";

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class AppError extends Error {}

export class DbError extends AppError {}

export class QueryError extends DbError {}

/**
 * Attach a tag to any error the way a foreign library would
 */
export function tagged<E extends Error>(error: E, type: string): E & { data: { type: string } } {
  return Object.assign(error, { data: { type } });
}

export function appError(type: string, message = "app failure"): TaggedError {
  return new TaggedError(message, { type });
}

// ---------------------------------------------------------------------------
// Requests and handlers
// ---------------------------------------------------------------------------

export function makeRequest(overrides?: Partial<HttpRequest>): HttpRequest {
  return {
    method: "GET",
    uri: "/items/1",
    ...overrides,
  };
}

/**
 * Handler answering 200 with a fixed label, to tell handlers apart
 */
export function labelled(label: string): ExceptionHandler {
  return () => ({ status: 200, body: label });
}
