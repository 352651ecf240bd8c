// =============================================================================
// ERROR KINDS
// =============================================================================

const ERROR_KINDS = [
  "config",
  "admission",
  "planning",
  "environment",
  "launch",
  "execution",
  "diagnostic",
  "cleanup",
  "reporting",
  "internal",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

// =============================================================================
// ERROR CLASSES
// =============================================================================

export class ShardlineError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind = "internal",
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ShardlineError";
  }
}

export class ConfigError extends ShardlineError {
  constructor(message: string, cause?: unknown) {
    super(message, "config", cause);
    this.name = "ConfigError";
  }
}

export class DatabaseError extends ShardlineError {
  constructor(message: string, kind: ErrorKind, cause?: unknown) {
    super(message, kind, cause);
    this.name = "DatabaseError";
  }
}

export class FilestoreError extends ShardlineError {
  constructor(message: string, kind: ErrorKind, cause?: unknown) {
    super(message, kind, cause);
    this.name = "FilestoreError";
  }
}

export class EngineLaunchError extends ShardlineError {
  constructor(message: string, cause?: unknown) {
    super(message, "launch", cause);
    this.name = "EngineLaunchError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  session: "SESSION_ERROR",
  database: "DATABASE_ERROR",
  validation: "VALIDATION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}
