import { FaultmapError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
  type HttpStatusCode,
} from "../catalog.js";
import type { FaultmapErrorOptions } from "../types.js";

type ConflictErrorCode = CodesForBase<"ConflictError">;

/**
 * Errors when an operation conflicts with existing state.
 * HTTP 409. The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictErrorCode = "HIERARCHY_CYCLE"> extends FaultmapError {
  readonly _tag = "ConflictError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: FaultmapErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
