/**
 * Error types for the scaffold tooling.
 *
 * Structural problems found in a file set are NOT errors: they are report
 * entries (see pipeline/types.ts). Errors are reserved for invocations that
 * cannot produce a report or a file set at all.
 */

import type { ZodError } from "zod";

export const ErrorCode = {
  /** Malformed invocation: empty module list, duplicate names, bad identifiers. */
  INPUT_ERROR: "INPUT_ERROR",
  /** Reading or writing project files failed. */
  PROJECT_IO_ERROR: "PROJECT_IO_ERROR",
  /** Persisted or environment configuration is unusable. */
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Process exit codes used by the CLI. */
export const ExitCode = {
  OK: 0,
  VIOLATIONS: 1,
  INPUT: 2,
  FAILURE: 3,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

export class ScaffoldError extends Error {
  public readonly code: ErrorCodeType;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: { details?: Record<string, unknown> | undefined; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ScaffoldError";
    this.code = code;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Thrown before any artifact is produced or any rule runs.
 */
export class InputError extends ScaffoldError {
  public readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super(message, ErrorCode.INPUT_ERROR, issues.length > 0 ? { details: { issues } } : undefined);
    this.name = "InputError";
    this.issues = issues;
  }

  static fromZodError(error: ZodError): InputError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    return new InputError(`Invalid input: ${issues.map((i) => i.message).join("; ")}`, issues);
  }
}

export class ProjectIoError extends ScaffoldError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, ErrorCode.PROJECT_IO_ERROR, { details: { filePath }, cause });
    this.name = "ProjectIoError";
  }
}

export class ConfigError extends ScaffoldError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, details ? { details } : undefined);
    this.name = "ConfigError";
  }
}

/**
 * Map a thrown value to the exit code the CLI should end with.
 */
export function toExitCode(error: unknown): ExitCodeType {
  if (error instanceof InputError || error instanceof ConfigError) {
    return ExitCode.INPUT;
  }
  return ExitCode.FAILURE;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
