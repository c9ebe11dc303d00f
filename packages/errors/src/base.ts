import type { BaseErrorType, ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by {@link FaultmapError.toJSON}
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  stack?: string | undefined;
}

/**
 * Root of the Faultmap error hierarchy.
 *
 * Subclasses fill in `code` and the catalog-derived fields. Use
 * `instanceof FaultmapError` to separate library failures from
 * application errors flowing through a pipeline.
 */
export abstract class FaultmapError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Check if a value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Check if a value is a FaultmapError
 */
export function isFaultmapError(value: unknown): value is FaultmapError {
  return value instanceof FaultmapError;
}
