/*
Purpose: turn anything a command throws into operator-readable stderr lines.
Assumptions: color follows the stream unless forced; NO_COLOR disables it.
Usage: console.error(renderCliError(toUserFacingError(err), { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import {
  ConfigError,
  DatabaseError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = { label: string | null; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { label: null, labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// Known failure classes get a title and a hint; everything else passes through.
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid configuration",
      message: error.message,
      hint: "Check shardline.yaml (or the file passed to --config) and the environment overrides.",
      cause: error,
    });
  }

  if (error instanceof DatabaseError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.database,
      title: "Database unavailable",
      message: error.message,
      hint: "Check database.url / DATABASE_URL and that the server accepts connections.",
      cause: error,
    });
  }

  return error;
}

export function cliExitCode(error: unknown): number {
  if (error instanceof UserFacingError && error.exitCode !== undefined && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (style.label === null) return line.text;

  const label = format(style.label, style.labelStyles);
  if (line.kind === "stack") {
    return `${label}\n${format(indent(line.text, 2), style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
