import { type Clock, defaultClock } from "@faultmap/core";
import type { HandlerWrap } from "../types.js";

/** Anything that accepts text, e.g. `process.stdout` */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ConsoleLoggingWrapOptions {
  /** Where log lines go (default: process.stdout) */
  readonly sink?: OutputSink;
  readonly clock?: Clock;
}

/**
 * Create a wrap that logs every handled error before delegating.
 *
 * Writes one line `<ISO time> <METHOD> "<uri>" => <message>` followed by
 * the error's stack trace, then calls the resolved handler once.
 */
export function createConsoleLoggingWrap(options?: ConsoleLoggingWrapOptions): HandlerWrap {
  const sink = options?.sink ?? process.stdout;
  const clock = options?.clock ?? defaultClock;

  return (handler, error, request) => {
    const timestamp = new Date(clock.now()).toISOString();
    sink.write(`${timestamp} ${request.method} ${JSON.stringify(request.uri)} => ${error.message}\n`);
    sink.write(`${error.stack ?? String(error)}\n`);
    return handler(error, request);
  };
}

/** Console logging wrap writing to process.stdout */
export const wrapLogToConsole: HandlerWrap = createConsoleLoggingWrap();
