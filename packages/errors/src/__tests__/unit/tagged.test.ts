import { describe, expect, it } from "vitest";
import { getErrorData, getErrorMessage, getErrorTag, TaggedError, toError } from "../../index.js";

describe("TaggedError", () => {
  it("should expose its payload and tag", () => {
    const error = new TaggedError("boom", { type: "app/boom", id: 7 });

    expect(error.name).toBe("TaggedError");
    expect(error.data).toEqual({ type: "app/boom", id: 7 });
    expect(getErrorTag(error)).toBe("app/boom");
    expect(getErrorData(error)).toEqual({ type: "app/boom", id: 7 });
  });

  it("should use the subclass name", () => {
    class PaymentError extends TaggedError<{ type: "app/payment" }> {}
    expect(new PaymentError("declined", { type: "app/payment" }).name).toBe("PaymentError");
  });
});

describe("getErrorTag", () => {
  it("returns undefined without a payload", () => {
    expect(getErrorTag(new Error("plain"))).toBeUndefined();
  });

  it("ignores empty and non-string types", () => {
    expect(getErrorTag(new TaggedError("x", { type: "" }))).toBeUndefined();
    expect(getErrorTag(Object.assign(new Error("x"), { data: { type: 42 } }))).toBeUndefined();
  });

  it("reads foreign errors that expose a data object", () => {
    expect(getErrorTag(Object.assign(new Error("x"), { data: { type: "lib/fail" } }))).toBe(
      "lib/fail",
    );
  });

  it("returns undefined for primitives", () => {
    expect(getErrorTag("oops")).toBeUndefined();
    expect(getErrorData(null)).toBeUndefined();
  });
});

describe("toError / getErrorMessage", () => {
  it("passes errors through", () => {
    const error = new Error("same");
    expect(toError(error)).toBe(error);
  });

  it("wraps strings and keeps the cause", () => {
    const error = toError("text failure");
    expect(error.message).toBe("text failure");
    expect(error.cause).toBe("text failure");
  });

  it("uses a fallback message for other values", () => {
    expect(getErrorMessage({ some: "object" })).toBe("An unknown error occurred");
  });
});
