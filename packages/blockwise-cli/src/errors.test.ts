import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import {
  AmbiguousPrefixError,
  InvalidStatusTransitionError,
  TaskBlockedError,
  TaskNotFoundError,
  TaskStatus,
  UnblockDependentsError,
} from 'blockwise-core';
import { CLIError, ExitCode, codeForExitCode, handleError, toCLIError } from './errors.js';

describe('CLIError', () => {
  it('derives the error code from the exit code', () => {
    const error = new CLIError('Nope', ExitCode.NotFound);
    expect(error.code).toBe('not_found');
    expect(error.name).toBe('CLIError');
    expect(new CLIError('Bad', ExitCode.InvalidInput, 'custom').code).toBe('custom');
  });

  it('maps every exit code', () => {
    expect(codeForExitCode(ExitCode.InvalidUsage)).toBe('invalid_usage');
    expect(codeForExitCode(ExitCode.DatabaseError)).toBe('database_error');
    expect(codeForExitCode(ExitCode.ValidationError)).toBe('validation_error');
  });
});

describe('toCLIError', () => {
  it('maps TaskNotFoundError to NotFound', () => {
    const error = toCLIError(new TaskNotFoundError('T1'));
    expect(error.exitCode).toBe(ExitCode.NotFound);
    expect(error.message).toBe('Task not found: T1');
    expect(error.details).toEqual({ task_id: 'T1' });
  });

  it('suggests the candidates of an ambiguous prefix', () => {
    const error = toCLIError(new AmbiguousPrefixError('01', ['01A', '01B']));
    expect(error.exitCode).toBe(ExitCode.InvalidInput);
    expect(error.code).toBe('ambiguous_id');
    expect(error.suggestions).toEqual(['blockwise task show 01A', 'blockwise task show 01B']);
  });

  it('carries the blocking ids of a blocked task', () => {
    const error = toCLIError(new TaskBlockedError('T2', ['T1']));
    expect(error.code).toBe('task_blocked');
    expect(error.details).toEqual({ task_id: 'T2', blocking_ids: ['T1'] });
  });

  it('maps invalid transitions to InvalidInput', () => {
    const error = toCLIError(
      new InvalidStatusTransitionError('T1', TaskStatus.Completed, TaskStatus.Paused)
    );
    expect(error.exitCode).toBe(ExitCode.InvalidInput);
    expect(error.code).toBe('invalid_status_transition');
  });

  it('reports partial unblock failures as a database error', () => {
    const error = toCLIError(
      new UnblockDependentsError('T1', [{ taskId: 'T2', fullyUnblocked: true }], [
        { taskId: 'T3', error: new Error('disk full') },
      ])
    );
    expect(error.exitCode).toBe(ExitCode.DatabaseError);
    expect(error.details).toEqual({ task_id: 'T1', unblocked: ['T2'], failed: ['T3'] });
  });

  it('flattens zod issues', () => {
    const parsed = z.object({ title: z.string() }).safeParse({ title: 3 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const error = toCLIError(parsed.error);
      expect(error.exitCode).toBe(ExitCode.InvalidInput);
      expect(error.message).toBe('Invalid input: title: Expected string, received number');
    }
  });

  it('wraps unknown errors as general errors', () => {
    expect(toCLIError(new Error('boom')).exitCode).toBe(ExitCode.GeneralError);
    expect(toCLIError('plain').message).toBe('plain');
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a JSON error envelope and exits with the mapped code', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit:${code}`);
    });

    expect(() => handleError(new TaskNotFoundError('T9'), true)).toThrow('exit:4');
    expect(exitSpy).toHaveBeenCalledWith(ExitCode.NotFound);

    const payload: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(payload).toEqual({
      schema_version: 'v1',
      ok: false,
      error: {
        code: 'not_found',
        message: 'Task not found: T9',
        details: { task_id: 'T9' },
        suggestions: ['blockwise task list'],
      },
    });
  });

  it('prints the message and hints to stderr in md mode', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit:${code}`);
    });

    expect(() =>
      handleError(
        new CLIError('Bad min', ExitCode.InvalidInput, undefined, undefined, ['blockwise dep impact --min 2'])
      )
    ).toThrow('exit:3');

    expect(errorSpy).toHaveBeenCalledWith('Error: Bad min');
    expect(errorSpy).toHaveBeenCalledWith('Hint: blockwise dep impact --min 2');
    expect(logSpy).not.toHaveBeenCalled();
  });
});
