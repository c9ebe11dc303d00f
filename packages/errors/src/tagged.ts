/**
 * Errors carrying a structured data payload.
 *
 * The payload's `type` field is the error's tag: the key the exception
 * engine looks up before falling back to the error's class.
 */

/**
 * Structured payload attached to a {@link TaggedError}
 */
export interface ErrorData {
  readonly type?: string | undefined;
  readonly [key: string]: unknown;
}

export class TaggedError<D extends ErrorData = ErrorData> extends Error {
  readonly data: D;

  constructor(message: string, data: D, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.data = data;
  }
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read the structured payload of any error-like value.
 * Works for TaggedError and for foreign errors that expose a `data` object.
 */
export function getErrorData(error: unknown): Readonly<Record<string, unknown>> | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const data = error["data"];
  return isRecord(data) ? data : undefined;
}

/**
 * Extract the tag from an error's payload, if it has one
 */
export function getErrorTag(error: unknown): string | undefined {
  const type = getErrorData(error)?.type;
  return typeof type === "string" && type.length > 0 ? type : undefined;
}
