/**
 * HTTP request as seen by interceptors and exception handlers
 */
export interface HttpRequest {
  /** Upper-case method, e.g. "GET" */
  readonly method: string;
  /** Request target (path and query) */
  readonly uri: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly params?: Readonly<Record<string, unknown>>;
  readonly body?: unknown;
}

/**
 * HTTP response produced by a route handler or an exception handler
 */
export interface HttpResponse {
  readonly status: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: unknown;
}

/** Terminal request handler at the end of an interceptor chain */
export type RequestHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;
