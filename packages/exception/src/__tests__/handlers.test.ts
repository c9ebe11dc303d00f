import { TaggedError } from "@faultmap/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  DECODE_TAG,
  REQUEST_COERCION_TAG,
  RESPONSE_COERCION_TAG,
  RESPONSE_TAG,
} from "../constants.js";
import { CoercionError, DecodeError, HttpResponseError } from "../errors.js";
import {
  createCoercionHandler,
  DEFAULT_HANDLERS,
  defaultHandler,
  encodeCoercionError,
  httpResponseHandler,
  requestParsingHandler,
} from "../handlers.js";
import { makeRequest, QueryError } from "./helpers.js";

const request = makeRequest();

afterEach(() => {
  vi.restoreAllMocks();
});

describe("defaultHandler", () => {
  it("answers 500 with the error's class name", () => {
    expect(defaultHandler(new QueryError("x"), request)).toEqual({
      status: 500,
      body: { type: "exception", class: "QueryError" },
    });
  });

  it("names built-in classes", () => {
    expect(defaultHandler(new TypeError("x"), request)).toEqual({
      status: 500,
      body: { type: "exception", class: "TypeError" },
    });
  });
});

describe("httpResponseHandler", () => {
  it("returns the embedded response verbatim", () => {
    const response = { status: 302, headers: { Location: "/login" } };
    expect(httpResponseHandler(new HttpResponseError(response), request)).toBe(response);
  });

  it("falls back to the default response when nothing valid is embedded", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = new TaggedError("x", { type: RESPONSE_TAG, response: { status: "nope" } });

    expect(httpResponseHandler(error, request)).toEqual({
      status: 500,
      body: { type: "exception", class: "TaggedError" },
    });
    expect(warn).toHaveBeenCalledWith(
      "[faultmap/exception] GET /items/1: error tagged 'faultmap.http/response' carries no valid response",
    );
  });
});

describe("requestParsingHandler", () => {
  it("answers 400 in plain text naming the format", () => {
    expect(requestParsingHandler(new DecodeError("json"), request)).toEqual({
      status: 400,
      headers: { "Content-Type": "text/plain" },
      body: 'Malformed "json" request.',
    });
  });

  it("names an unknown format when the payload has none", () => {
    const error = new TaggedError("x", { type: DECODE_TAG });
    expect(requestParsingHandler(error, request)).toMatchObject({
      body: 'Malformed "unknown" request.',
    });
  });
});

describe("coercion handlers", () => {
  const issues = [
    { field: "body.age", message: "Expected number, received string", code: "invalid_type" },
  ];

  it("answers request coercion failures with 400 problem details", () => {
    const handler = createCoercionHandler(400);

    expect(handler(new CoercionError("request", issues), request)).toEqual({
      status: 400,
      body: {
        type: "/errors/REQUEST_VALIDATION_FAILED",
        title: "Request validation failed",
        status: 400,
        code: "REQUEST_VALIDATION_FAILED",
        domain: "validation",
        detail: "Request coercion failed",
        errors: issues,
      },
    });
  });

  it("answers response coercion failures with 500 problem details", () => {
    const response = createCoercionHandler(500)(new CoercionError("response", issues), request);

    expect(response).toMatchObject({
      status: 500,
      body: {
        type: "/errors/RESPONSE_VALIDATION_FAILED",
        title: "Response validation failed",
        status: 500,
        detail: "Response coercion failed",
      },
    });
  });

  it("names the response failure for a response-coercion error without a scope", () => {
    const error = new TaggedError("bad response", { type: RESPONSE_COERCION_TAG, issues: [] });

    expect(createCoercionHandler(500)(error, request)).toEqual({
      status: 500,
      body: {
        type: "/errors/RESPONSE_VALIDATION_FAILED",
        title: "Response validation failed",
        status: 500,
        code: "RESPONSE_VALIDATION_FAILED",
        domain: "validation",
        detail: "bad response",
      },
    });
  });

  it("lets the tag win over a conflicting scope", () => {
    const error = new TaggedError("mixed", {
      type: REQUEST_COERCION_TAG,
      scope: "response",
      issues: [],
    });

    expect(encodeCoercionError(error, 400).code).toBe("REQUEST_VALIDATION_FAILED");
  });

  it("falls back to the scope under a foreign tag", () => {
    const error = new TaggedError("aliased", { type: "app/bad-output", scope: "response" });

    expect(encodeCoercionError(error, 500).code).toBe("RESPONSE_VALIDATION_FAILED");
  });

  it("passes the error and status to a custom encoder", () => {
    const encoder = vi.fn(() => "encoded");
    const error = new CoercionError("request", issues);

    expect(createCoercionHandler(422, encoder)(error, request)).toEqual({
      status: 422,
      body: "encoded",
    });
    expect(encoder).toHaveBeenCalledWith(error, 422);
  });

  it("drops malformed issues", () => {
    const error = new TaggedError("bad", { type: REQUEST_COERCION_TAG, issues: "not a list" });
    const body = encodeCoercionError(error, 400);

    expect(body.errors).toBeUndefined();
    expect(body.detail).toBe("bad");
  });
});

describe("CoercionError", () => {
  it("picks the tag from the scope", () => {
    expect(new CoercionError("request", []).data.type).toBe(REQUEST_COERCION_TAG);
    expect(new CoercionError("response", []).data.type).toBe(RESPONSE_COERCION_TAG);
  });

  it("converts zod issues", () => {
    const result = z.object({ age: z.number() }).safeParse({ age: "x" });
    expect(result.success).toBe(false);
    if (!result.success) {
      const error = CoercionError.fromZod("request", result.error);

      expect(error.cause).toBe(result.error);
      expect(error.data.issues).toEqual([
        { field: "age", message: "Expected number, received string", code: "invalid_type" },
      ]);
    }
  });

  it("names the root for top-level zod issues", () => {
    const result = z.string().safeParse(5);
    if (!result.success) {
      expect(CoercionError.fromZod("response", result.error).data.issues[0]?.field).toBe("(root)");
    }
    expect(result.success).toBe(false);
  });
});

describe("DEFAULT_HANDLERS", () => {
  it("covers the built-in error kinds", () => {
    expect(DEFAULT_HANDLERS.default).toBe(defaultHandler);
    expect(Object.keys(DEFAULT_HANDLERS.tags ?? {})).toEqual([
      RESPONSE_TAG,
      DECODE_TAG,
      REQUEST_COERCION_TAG,
      RESPONSE_COERCION_TAG,
    ]);
    expect(DEFAULT_HANDLERS.wrap).toBeUndefined();
  });
});
