import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type SessionEvent = JsonObject & {
  ts: string;
  event: string;
  session: string;
};

export type SessionEventInput = JsonObject & {
  event: string;
  session?: string;
  ts?: string;
};

type EventDefaults = {
  session?: string;
};

type LoggerOptions = {
  echo?: boolean;
  debug?: boolean;
};

type LogFailureAction = "write" | "close";

// Any sink the orchestrator can append session events to.
export interface EventSink {
  log(event: SessionEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private readonly echo: boolean;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    options: LoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.echo = options.echo ?? false;
    this.isDebugEnabled = options.debug ?? resolveLoggerDebugEnabled();
  }

  log(event: SessionEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: SessionEvent): void {
    if (this.closed) return;
    const line = JSON.stringify(event);
    try {
      fs.writeSync(this.fileDescriptor, `${line}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
    if (this.echo) {
      console.log(line);
    }
  }
}

export class MemoryEventSink implements EventSink {
  readonly events: SessionEvent[] = [];

  constructor(private readonly defaults: EventDefaults = {}) {}

  log(event: SessionEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }

  close(): void {
    // Nothing to flush.
  }

  names(): string[] {
    return this.events.map((e) => e.event);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: SessionEventInput, defaults: EventDefaults = {}): SessionEvent {
  const { session: providedSession, ts, event: name, ...rest } = event;

  const session = providedSession ?? defaults.session;
  if (!session) {
    throw new Error("session is required for session events");
  }

  const normalizedTs = typeof ts === "string" ? ts : isoNow();

  return {
    ts: normalizedTs,
    event: name,
    session,
    ...rest,
  };
}

export function logSessionEvent(sink: EventSink, event: string, fields: JsonObject = {}): void {
  sink.log({ ...fields, event });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write event to ${filePath}` : `close event log ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
