import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  CycleError,
  ProblemDetailsSchema,
  problemDetailsFor,
  safeParseProblemDetails,
  serializeToRFC9457,
} from "../../index.js";

describe("serializeToRFC9457", () => {
  it("should produce schema-valid problem details", () => {
    const details = serializeToRFC9457(new CycleError("app/a", "app/b"));

    expect(details.type).toBe("/errors/HIERARCHY_CYCLE");
    expect(details.title).toBe("Hierarchy cycle");
    expect(details.status).toBe(409);
    expect(details.domain).toBe("hierarchy");
    expect(details.errors).toBeUndefined();
    expect(ProblemDetailsSchema.safeParse(details).success).toBe(true);
  });

  it("should include validation issues", () => {
    const details = serializeToRFC9457(
      new ConfigurationError("bad", [{ field: "wrap", message: "Expected function", code: "invalid_type" }]),
    );

    expect(details.errors).toEqual([
      { field: "wrap", message: "Expected function", code: "invalid_type" },
    ]);
  });
});

describe("problemDetailsFor", () => {
  it("should take status and title from the catalog", () => {
    const details = problemDetailsFor("REQUEST_VALIDATION_FAILED", [
      { field: "body.age", message: "Expected number", code: "invalid_type", value: "x" },
    ]);

    expect(details).toEqual({
      type: "/errors/REQUEST_VALIDATION_FAILED",
      title: "Request validation failed",
      status: 400,
      code: "REQUEST_VALIDATION_FAILED",
      domain: "validation",
      errors: [{ field: "body.age", message: "Expected number", code: "invalid_type", value: "x" }],
    });
  });

  it("should allow the status and detail to be overridden", () => {
    const details = problemDetailsFor("VALIDATION_FAILED", [], { status: 422, detail: "nope" });

    expect(details.status).toBe(422);
    expect(details.detail).toBe("nope");
    expect(details.errors).toBeUndefined();
  });
});

describe("safeParseProblemDetails", () => {
  it("should reject bodies without a title", () => {
    expect(safeParseProblemDetails({ type: "/errors/X", status: 400 })).toBeUndefined();
  });

  it("should reject out-of-range statuses", () => {
    expect(safeParseProblemDetails({ type: "/errors/X", title: "x", status: 700 })).toBeUndefined();
  });

  it("should accept a minimal body", () => {
    expect(safeParseProblemDetails({ type: "/errors/X", title: "x", status: 418 })).toEqual({
      type: "/errors/X",
      title: "x",
      status: 418,
    });
  });
});
