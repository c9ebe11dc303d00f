/**
 * Default exception handlers.
 *
 * Each handler maps one built-in error kind to a response. Any error may
 * carry any tag, so payloads are validated before use.
 */

import type { HttpResponse } from "@faultmap/core";
import {
  type ErrorCode,
  getErrorData,
  getErrorTag,
  problemDetailsFor,
  type ProblemDetails,
  ValidationIssueSchema,
} from "@faultmap/errors";
import { z } from "zod";
import {
  DECODE_TAG,
  REQUEST_COERCION_TAG,
  RESPONSE_COERCION_TAG,
  RESPONSE_TAG,
} from "./constants.js";
import { typeName, typeOf } from "./type-hierarchy.js";
import type { ExceptionHandler, HandlerTable } from "./types.js";

const HttpResponseSchema = z.object({
  status: z.number().int().min(100).max(599),
  headers: z.record(z.string()).optional(),
  body: z.unknown().optional(),
});

const IssuesSchema = z.array(ValidationIssueSchema);

function isHttpResponse(value: unknown): value is HttpResponse {
  return HttpResponseSchema.safeParse(value).success;
}

/**
 * Generic 500 naming the error's runtime type. Never throws.
 */
export const defaultHandler: ExceptionHandler = (error) => ({
  status: 500,
  body: {
    type: "exception",
    class: typeName(typeOf(error)),
  },
});

/**
 * Return the response embedded in the error's payload as-is.
 * Falls back to {@link defaultHandler} when the payload holds no valid response.
 */
export const httpResponseHandler: ExceptionHandler = (error, request) => {
  const response: unknown = getErrorData(error)?.["response"];
  if (!isHttpResponse(response)) {
    console.warn(
      `[faultmap/exception] ${request.method} ${request.uri}: error tagged '${RESPONSE_TAG}' carries no valid response`,
    );
    return defaultHandler(error, request);
  }
  return response;
};

/**
 * 400 plain-text answer for a request body that could not be decoded
 */
export const requestParsingHandler: ExceptionHandler = (error) => {
  const format = getErrorData(error)?.["format"];
  return {
    status: 400,
    headers: { "Content-Type": "text/plain" },
    body: `Malformed ${JSON.stringify(typeof format === "string" ? format : "unknown")} request.`,
  };
};

/**
 * Encodes a coercion failure into a response body
 */
export type CoercionEncoder = (error: Error, status: number) => unknown;

/**
 * Encode a coercion failure as RFC 9457 Problem Details.
 *
 * The catalog code follows the error's tag, then the payload's `scope`
 * for errors reaching a coercion handler under some other tag. Issues that
 * do not match the validation issue shape are dropped.
 */
export function encodeCoercionError(error: Error, status: number): ProblemDetails {
  const data = getErrorData(error);
  const tag = getErrorTag(error);
  const isResponse =
    tag === RESPONSE_COERCION_TAG || (tag !== REQUEST_COERCION_TAG && data?.["scope"] === "response");
  const code: ErrorCode = isResponse ? "RESPONSE_VALIDATION_FAILED" : "REQUEST_VALIDATION_FAILED";
  const parsed = IssuesSchema.safeParse(data?.["issues"]);
  return problemDetailsFor(code, parsed.success ? parsed.data : [], {
    status,
    detail: error.message,
  });
}

/**
 * Create a handler answering coercion failures with a fixed status
 */
export function createCoercionHandler(
  status: number,
  encoder: CoercionEncoder = encodeCoercionError,
): ExceptionHandler {
  return (error) => ({
    status,
    body: encoder(error, status),
  });
}

/**
 * Base handler table merged under caller overrides
 */
export const DEFAULT_HANDLERS: HandlerTable = Object.freeze({
  default: defaultHandler,
  tags: Object.freeze({
    [RESPONSE_TAG]: httpResponseHandler,
    [DECODE_TAG]: requestParsingHandler,
    [REQUEST_COERCION_TAG]: createCoercionHandler(400),
    [RESPONSE_COERCION_TAG]: createCoercionHandler(500),
  }),
});
