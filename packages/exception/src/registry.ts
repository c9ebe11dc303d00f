import { ConfigurationError, type ValidationIssue } from "@faultmap/errors";
import { z } from "zod";
import { DEFAULT_HANDLERS } from "./handlers.js";
import { isErrorClass } from "./type-hierarchy.js";
import type {
  ErrorClass,
  ErrorTag,
  ExceptionHandler,
  HandlerTable,
  HandlerWrap,
  Identifier,
} from "./types.js";

// ---------------------------------------------------------------------------
// Table validation
// ---------------------------------------------------------------------------

const HandlerSchema = z.custom<ExceptionHandler>((value) => typeof value === "function", {
  message: "Expected a handler function",
});

const WrapSchema = z.custom<HandlerWrap>((value) => typeof value === "function", {
  message: "Expected a wrap function",
});

const ErrorClassSchema = z.custom<ErrorClass>(isErrorClass, {
  message: "Expected an Error class",
});

const HandlerTableSchema = z
  .object({
    default: HandlerSchema.optional(),
    wrap: WrapSchema.optional(),
    tags: z.record(z.string().min(1, "Tag must be a non-empty string"), HandlerSchema).optional(),
    types: z.array(z.tuple([ErrorClassSchema, HandlerSchema])).optional(),
  })
  .strict();

type ParsedTable = z.infer<typeof HandlerTableSchema>;

function parseTable(table: unknown, position: number): ParsedTable {
  const result = HandlerTableSchema.safeParse(table);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "(table)",
      message: issue.message,
      code: issue.code,
    }));
    throw new ConfigurationError(`handler table #${position} is invalid`, issues);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// HandlerRegistry
// ---------------------------------------------------------------------------

/**
 * Immutable mapping from identifier to exception handler, plus the reserved
 * `default` and `wrap` entries.
 *
 * Built from one or more tables merged left to right; an entry in a later
 * table replaces the entry with the same identifier in an earlier one.
 */
export class HandlerRegistry {
  private readonly tagHandlers: ReadonlyMap<ErrorTag, ExceptionHandler>;
  private readonly typeHandlers: ReadonlyMap<ErrorClass, ExceptionHandler>;

  /** Handler used when no identifier matches */
  readonly defaultHandler: ExceptionHandler;

  /** Indirection applied to every handler invocation, if registered */
  readonly wrap: HandlerWrap | undefined;

  private constructor(
    tagHandlers: ReadonlyMap<ErrorTag, ExceptionHandler>,
    typeHandlers: ReadonlyMap<ErrorClass, ExceptionHandler>,
    defaultHandler: ExceptionHandler,
    wrap: HandlerWrap | undefined,
  ) {
    this.tagHandlers = tagHandlers;
    this.typeHandlers = typeHandlers;
    this.defaultHandler = defaultHandler;
    this.wrap = wrap;
  }

  /**
   * Merge handler tables into a registry.
   *
   * @throws ConfigurationError if a table is malformed or no `default` handler remains after merge
   */
  static from(...tables: readonly HandlerTable[]): HandlerRegistry {
    const tagHandlers = new Map<ErrorTag, ExceptionHandler>();
    const typeHandlers = new Map<ErrorClass, ExceptionHandler>();
    let defaultHandler: ExceptionHandler | undefined;
    let wrap: HandlerWrap | undefined;

    for (const [index, table] of tables.entries()) {
      const parsed = parseTable(table, index);
      for (const [tag, handler] of Object.entries(parsed.tags ?? {})) {
        tagHandlers.set(tag, handler);
      }
      for (const [type, handler] of parsed.types ?? []) {
        typeHandlers.set(type, handler);
      }
      defaultHandler = parsed.default ?? defaultHandler;
      wrap = parsed.wrap ?? wrap;
    }

    if (defaultHandler === undefined) {
      throw new ConfigurationError("no default handler registered", [
        { field: "default", message: "A default handler is required", code: "missing_default" },
      ]);
    }

    return new HandlerRegistry(tagHandlers, typeHandlers, defaultHandler, wrap);
  }

  /** Handler registered for an identifier (reserved entries excluded) */
  get(identifier: Identifier): ExceptionHandler | undefined {
    return typeof identifier === "string"
      ? this.tagHandlers.get(identifier)
      : this.typeHandlers.get(identifier);
  }

  has(identifier: Identifier): boolean {
    return this.get(identifier) !== undefined;
  }

  /** Registered identifiers: tags first, then types, each in insertion order */
  keys(): Identifier[] {
    return [...this.tagHandlers.keys(), ...this.typeHandlers.keys()];
  }

  /** Number of identifier entries, not counting `default` and `wrap` */
  get size(): number {
    return this.tagHandlers.size + this.typeHandlers.size;
  }

  /** This registry as a single table */
  toTable(): HandlerTable {
    return {
      default: this.defaultHandler,
      wrap: this.wrap,
      tags: Object.fromEntries(this.tagHandlers),
      types: [...this.typeHandlers],
    };
  }

  /** New registry with `tables` merged over this one */
  extend(...tables: readonly HandlerTable[]): HandlerRegistry {
    return HandlerRegistry.from(this.toTable(), ...tables);
  }
}

/**
 * Registry of {@link DEFAULT_HANDLERS} with `overrides` merged on top
 */
export function createHandlerRegistry(...overrides: readonly HandlerTable[]): HandlerRegistry {
  return HandlerRegistry.from(DEFAULT_HANDLERS, ...overrides);
}
