/**
 * CLI error reporting
 *
 * Maps every error the core can raise onto a process exit code, and prints
 * it either as a colored line or, with `--json`, as a structured object.
 */

import { ConfigError } from '../config/index.js';
import { ForgeAuthError, ForgeError, TimeoutError } from '../forge/errors.js';
import { TunnelError } from '../tunnel/errors.js';
import { formatError, formatJson, dim, print, printError } from './formatter.js';

export const ExitCode = {
  SUCCESS: 0,
  GENERAL: 1,
  CONFIG: 10,
  AUTH: 11,
  VALIDATION: 12,
  API: 13,
  TIMEOUT: 14,
  LOG_NOT_FOUND: 15,
  JOB_NOT_FOUND: 16,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================================================
// CLI Errors
// ============================================================================

export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class JobNotFoundError extends Error {
  override readonly name = 'JobNotFoundError';

  constructor(readonly jobId: string) {
    super(`Job not found in local cache: ${jobId}`);
    Object.setPrototypeOf(this, JobNotFoundError.prototype);
  }
}

export class LogNotFoundError extends Error {
  override readonly name = 'LogNotFoundError';

  constructor(
    message: string,
    readonly jobId?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, LogNotFoundError.prototype);
  }
}

// ============================================================================
// Mapping
// ============================================================================

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return ExitCode.CONFIG;
  if (error instanceof ForgeAuthError) return ExitCode.AUTH;
  if (error instanceof ValidationError) return ExitCode.VALIDATION;
  if (error instanceof TimeoutError) return ExitCode.TIMEOUT;
  if (error instanceof LogNotFoundError) return ExitCode.LOG_NOT_FOUND;
  if (error instanceof JobNotFoundError) return ExitCode.JOB_NOT_FOUND;
  if (error instanceof ForgeError) {
    return error.isAuthFailure ? ExitCode.AUTH : ExitCode.API;
  }
  return ExitCode.GENERAL;
}

function hintFor(error: unknown): string | undefined {
  if (error instanceof ForgeAuthError) return error.hint;
  if (error instanceof ForgeError && error.isAuthFailure) {
    return 'Check that the forge token is valid and has workflow permissions';
  }
  if (error instanceof TunnelError) {
    return "Run 'bridgeline tunnel status' to diagnose the connection";
  }
  return undefined;
}

function errorType(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

export interface JsonErrorBody {
  success: false;
  error: {
    type: string;
    message: string;
    exit_code: ExitCode;
    hint?: string;
  };
}

export function errorToJson(error: unknown): JsonErrorBody {
  const hint = hintFor(error);
  return {
    success: false,
    error: {
      type: errorType(error),
      message: error instanceof Error ? error.message : String(error),
      exit_code: exitCodeFor(error),
      ...(hint ? { hint } : {}),
    },
  };
}

/**
 * Print the error and set `process.exitCode`. JSON goes to stdout so that
 * scripted callers read a single stream.
 */
export function reportError(error: unknown, json: boolean): void {
  const code = exitCodeFor(error);

  if (json) {
    print(formatJson(errorToJson(error)));
  } else {
    printError(formatError(error instanceof Error ? error.message : String(error)));
    if (error instanceof ValidationError) {
      for (const issue of error.issues) {
        printError(`  ${dim('-')} ${issue}`);
      }
    }
    const hint = hintFor(error);
    if (hint) {
      printError(dim(`  Hint: ${hint}`));
    }
  }

  process.exitCode = code;
}
