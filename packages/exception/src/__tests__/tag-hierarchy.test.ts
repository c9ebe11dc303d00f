import { ConfigurationError, CycleError } from "@faultmap/errors";
import { describe, expect, it } from "vitest";
import { TagHierarchy } from "../tag-hierarchy.js";

describe("TagHierarchy — derive", () => {
  it("records parents and children", () => {
    const hierarchy = new TagHierarchy().derive("app/error", "app/exception");

    expect([...hierarchy.parents("app/error")]).toEqual(["app/exception"]);
    expect([...hierarchy.ancestors("app/error")]).toEqual(["app/exception"]);
    expect([...hierarchy.descendants("app/exception")]).toEqual(["app/error"]);
  });

  it("is idempotent", () => {
    const hierarchy = new TagHierarchy()
      .derive("app/error", "app/exception")
      .derive("app/error", "app/exception");

    expect([...hierarchy.parents("app/error")]).toEqual(["app/exception"]);
    expect([...hierarchy.descendants("app/exception")]).toEqual(["app/error"]);
  });

  it("rejects a two-tag cycle and keeps the existing edge", () => {
    const hierarchy = new TagHierarchy().derive("app/a", "app/b");

    expect(() => hierarchy.derive("app/b", "app/a")).toThrow(CycleError);
    expect([...hierarchy.ancestors("app/a")]).toEqual(["app/b"]);
    expect([...hierarchy.ancestors("app/b")]).toEqual([]);
    expect([...hierarchy.descendants("app/a")]).toEqual([]);
  });

  it("rejects a transitive cycle", () => {
    const hierarchy = new TagHierarchy().derive("app/a", "app/b").derive("app/b", "app/c");

    expect(() => hierarchy.derive("app/c", "app/a")).toThrow(CycleError);
    expect(hierarchy.parents("app/c").size).toBe(0);
  });

  it("rejects self-derivation", () => {
    expect(() => new TagHierarchy().derive("app/a", "app/a")).toThrow(
      "Tag 'app/a' cannot derive from itself",
    );
  });

  it("rejects empty tags", () => {
    expect(() => new TagHierarchy().derive("", "app/a")).toThrow(ConfigurationError);
  });

  it("rejects writes once frozen", () => {
    const hierarchy = new TagHierarchy().derive("app/a", "app/b").freeze();

    expect(hierarchy.isFrozen).toBe(true);
    expect(() => hierarchy.derive("app/c", "app/b")).toThrow(ConfigurationError);
    expect([...hierarchy.descendants("app/b")]).toEqual(["app/a"]);
  });

  it("accepts an existing edge again after freezing", () => {
    const hierarchy = new TagHierarchy().derive("app/a", "app/b").freeze();

    expect(hierarchy.derive("app/a", "app/b")).toBe(hierarchy);
    expect([...hierarchy.parents("app/a")]).toEqual(["app/b"]);
  });
});

describe("TagHierarchy — queries", () => {
  const hierarchy = TagHierarchy.from([
    ["app/query", "app/db"],
    ["app/query", "app/retryable"],
    ["app/db", "app/exception"],
    ["app/retryable", "app/exception"],
  ]);

  it("lists ancestors breadth-first, nearest first", () => {
    expect([...hierarchy.ancestors("app/query")]).toEqual([
      "app/db",
      "app/retryable",
      "app/exception",
    ]);
  });

  it("lists descendants breadth-first without duplicates", () => {
    expect([...hierarchy.descendants("app/exception")]).toEqual([
      "app/db",
      "app/retryable",
      "app/query",
    ]);
  });

  it("returns empty sets for unknown tags", () => {
    expect(hierarchy.ancestors("app/unknown").size).toBe(0);
    expect(hierarchy.descendants("app/unknown").size).toBe(0);
  });

  it("isA is reflexive and transitive", () => {
    expect(hierarchy.isA("app/query", "app/query")).toBe(true);
    expect(hierarchy.isA("app/query", "app/exception")).toBe(true);
    expect(hierarchy.isA("app/exception", "app/query")).toBe(false);
  });

  it("tags lists every tag in an edge", () => {
    expect(hierarchy.tags().sort()).toEqual([
      "app/db",
      "app/exception",
      "app/query",
      "app/retryable",
    ]);
  });

  it("parents returns a copy", () => {
    const parents = hierarchy.parents("app/query");
    expect(parents).not.toBe(hierarchy.parents("app/query"));
    expect([...parents]).toEqual(["app/db", "app/retryable"]);
  });
});
