import Database from 'better-sqlite3';
import { ZodError } from 'zod';
import {
  AmbiguousPrefixError,
  InvalidStatusTransitionError,
  TaskBlockedError,
  TaskNotFoundError,
  UnblockDependentsError,
} from 'blockwise-core';
import { createErrorEnvelope } from './output.js';

export enum ExitCode {
  Success = 0,
  GeneralError = 1,
  InvalidUsage = 2,
  InvalidInput = 3,
  NotFound = 4,
  DatabaseError = 5,
  ValidationError = 6,
}

export class CLIError extends Error {
  public readonly exitCode: ExitCode;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly suggestions?: string[];

  constructor(
    message: string,
    exitCode: ExitCode = ExitCode.GeneralError,
    code?: string,
    details?: unknown,
    suggestions?: string[]
  ) {
    super(message);
    this.exitCode = exitCode;
    this.code = code ?? codeForExitCode(exitCode);
    this.details = details;
    this.suggestions = suggestions;
    this.name = 'CLIError';
  }
}

/** Map errors raised by the core onto exit codes and stable error codes. */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) return error;

  if (error instanceof TaskNotFoundError) {
    return new CLIError(error.message, ExitCode.NotFound, undefined, { task_id: error.taskId }, [
      'blockwise task list',
    ]);
  }
  if (error instanceof AmbiguousPrefixError) {
    return new CLIError(
      error.message,
      ExitCode.InvalidInput,
      'ambiguous_id',
      { matches: error.matches },
      error.matches.slice(0, 5).map((id) => `blockwise task show ${id}`)
    );
  }
  if (error instanceof TaskBlockedError) {
    return new CLIError(
      error.message,
      ExitCode.InvalidInput,
      'task_blocked',
      { task_id: error.taskId, blocking_ids: error.blockingIds },
      [`blockwise dep show ${error.taskId}`]
    );
  }
  if (error instanceof InvalidStatusTransitionError) {
    return new CLIError(error.message, ExitCode.InvalidInput, 'invalid_status_transition', {
      task_id: error.taskId,
      from: error.from,
      to: error.to,
    });
  }
  if (error instanceof UnblockDependentsError) {
    return new CLIError(error.message, ExitCode.DatabaseError, 'unblock_failed', {
      task_id: error.completedTaskId,
      unblocked: error.results.map((r) => r.taskId),
      failed: error.failures.map((f) => f.taskId),
    });
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`);
    return new CLIError(`Invalid input: ${issues.join('; ')}`, ExitCode.InvalidInput, undefined, {
      issues,
    });
  }
  if (error instanceof Database.SqliteError) {
    return new CLIError(error.message, ExitCode.DatabaseError, undefined, { sqlite_code: error.code });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CLIError(message, ExitCode.GeneralError);
}

export function handleError(error: unknown, json: boolean = false): void {
  const cliError = toCLIError(error);

  if (json) {
    console.log(
      JSON.stringify(
        createErrorEnvelope(cliError.code, cliError.message, cliError.details, cliError.suggestions)
      )
    );
  } else {
    console.error(`Error: ${cliError.message}`);
    for (const suggestion of cliError.suggestions ?? []) {
      console.error(`Hint: ${suggestion}`);
    }
  }
  process.exit(cliError.exitCode);
}

export function codeForExitCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCode.InvalidUsage:
      return 'invalid_usage';
    case ExitCode.InvalidInput:
      return 'invalid_input';
    case ExitCode.NotFound:
      return 'not_found';
    case ExitCode.DatabaseError:
      return 'database_error';
    case ExitCode.ValidationError:
      return 'validation_error';
    case ExitCode.GeneralError:
      return 'general_error';
    case ExitCode.Success:
      return 'success';
    default:
      return 'general_error';
  }
}
