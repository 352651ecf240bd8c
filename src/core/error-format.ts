/*
Purpose: shared error formatting for logs, summaries and CLI output.
Assumptions: callers only need string or line-based representations.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import { ShardlineError, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";
export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
      if (error.cause !== undefined) {
        lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
      }
      appendStack(lines, error.cause instanceof Error ? error.cause : error);
    }
    return lines;
  }

  if (error instanceof ShardlineError) {
    lines.push({ kind: "title", text: `${error.kind} error` });
    lines.push({ kind: "message", text: error.message });
  } else {
    lines.push({ kind: "title", text: "Unexpected error" });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode === "debug") {
    if (error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }
    if (error instanceof ShardlineError && error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error instanceof Error) {
      appendStack(lines, error);
    }
  }

  return lines;
}

function appendStack(lines: ErrorFormatLine[], error: Error): void {
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor !== undefined) return options.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return options.stream?.isTTY === true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}
