/**
 * Failure disposition.
 * Purpose: one place that decides whether a boundary error stops the command
 * or is recorded and skipped.
 */

import type { ErrorKind, ShardlineError } from "./errors.js";
import { logSessionEvent, type EventSink, type JsonObject } from "./logger.js";
import type { Result } from "./result.js";

export type FailureDisposition = "fatal" | "non_fatal";

const FATAL_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["config", "internal"]);

const EVENT_BY_KIND: Partial<Record<ErrorKind, string>> = {
  admission: "guardrail_unavailable",
  environment: "environment_failed",
  diagnostic: "diagnostic_failed",
  cleanup: "cleanup_failed",
  reporting: "reporting_failed",
};

export function dispositionFor(kind: ErrorKind): FailureDisposition {
  return FATAL_KINDS.has(kind) ? "fatal" : "non_fatal";
}

export type NonFatalReporter = {
  events?: EventSink;
  warn?: (message: string) => void;
};

// Records a non-fatal failure; rethrows fatal ones so the CLI layer renders them.
// `eventName` overrides the event derived from the error kind.
export function handleFailure(
  error: ShardlineError,
  reporter: NonFatalReporter,
  fields: JsonObject = {},
  eventName?: string,
): void {
  if (dispositionFor(error.kind) === "fatal") {
    throw error;
  }

  const warn = reporter.warn ?? ((message: string) => console.warn(message));
  warn(`Warning: ${error.message}`);

  if (reporter.events) {
    const name = eventName ?? EVENT_BY_KIND[error.kind] ?? `${error.kind}_failed`;
    logSessionEvent(reporter.events, name, {
      ...fields,
      kind: error.kind,
      message: error.message,
    });
  }
}

export function settle<T>(
  result: Result<T>,
  fallback: T,
  reporter: NonFatalReporter,
  fields: JsonObject = {},
): T {
  if (result.ok) return result.value;
  handleFailure(result.error, reporter, fields);
  return fallback;
}
