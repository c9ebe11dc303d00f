import type { HttpResponse } from "@faultmap/core";
import { TaggedError, type ValidationIssue } from "@faultmap/errors";
import type { ZodError } from "zod";
import {
  DECODE_TAG,
  REQUEST_COERCION_TAG,
  RESPONSE_COERCION_TAG,
  RESPONSE_TAG,
} from "./constants.js";

// ---------------------------------------------------------------------------
// Embedded response
// ---------------------------------------------------------------------------

export type HttpResponseErrorData = {
  readonly type: typeof RESPONSE_TAG;
  readonly response: HttpResponse;
};

/**
 * Raised by route code to short-circuit with a ready-made response.
 * The response is returned verbatim by the default handler set.
 */
export class HttpResponseError extends TaggedError<HttpResponseErrorData> {
  constructor(response: HttpResponse, message = `HTTP ${response.status}`) {
    super(message, { type: RESPONSE_TAG, response });
  }
}

// ---------------------------------------------------------------------------
// Request body decoding
// ---------------------------------------------------------------------------

export type DecodeErrorData = {
  readonly type: typeof DECODE_TAG;
  /** Declared format of the body that failed to decode, e.g. "json" */
  readonly format: string;
};

/**
 * Raised by a body decoder when the request body is not valid in its
 * declared format.
 */
export class DecodeError extends TaggedError<DecodeErrorData> {
  constructor(format: string, options?: ErrorOptions) {
    super(`Malformed ${format} request`, { type: DECODE_TAG, format }, options);
  }
}

// ---------------------------------------------------------------------------
// Request / response coercion
// ---------------------------------------------------------------------------

export type CoercionScope = "request" | "response";

export type CoercionErrorData = {
  readonly type: typeof REQUEST_COERCION_TAG | typeof RESPONSE_COERCION_TAG;
  readonly scope: CoercionScope;
  readonly issues: readonly ValidationIssue[];
};

/**
 * Raised when a request or a handler's response does not match its schema.
 * The scope picks the tag, and with it the status of the default handler.
 */
export class CoercionError extends TaggedError<CoercionErrorData> {
  constructor(scope: CoercionScope, issues: readonly ValidationIssue[], options?: ErrorOptions) {
    super(
      `${scope === "request" ? "Request" : "Response"} coercion failed`,
      {
        type: scope === "request" ? REQUEST_COERCION_TAG : RESPONSE_COERCION_TAG,
        scope,
        issues,
      },
      options,
    );
  }

  /**
   * Build a CoercionError from a failed zod parse, one issue per zod issue.
   */
  static fromZod(scope: CoercionScope, error: ZodError): CoercionError {
    const issues = error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
      code: issue.code,
    }));
    return new CoercionError(scope, issues, { cause: error });
  }
}
