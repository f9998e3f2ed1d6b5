import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { TaskPriority, TaskStatus } from 'blockwise-core';
import { runAdd } from './add.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';
import { CLIError, ExitCode } from '../../errors.js';

describe('runAdd', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-add-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates an active task with defaults', () => {
    const result = runAdd({ services, title: 'Write docs', json: false });

    expect(result.title).toBe('Write docs');
    expect(result.status).toBe(TaskStatus.Active);
    expect(result.priority).toBe(TaskPriority.Normal);
    expect(result.tags).toEqual([]);
    expect(services.taskService.getTask(result.task_id)?.title).toBe('Write docs');
  });

  it('stores project, priority and tags', () => {
    const result = runAdd({
      services,
      title: 'Ship',
      project: 'release',
      priority: TaskPriority.High,
      tags: ['cli', 'docs'],
      json: false,
    });

    expect(result.project).toBe('release');
    expect(result.priority).toBe(TaskPriority.High);
    expect(result.tags).toEqual(['cli', 'docs']);
  });

  it('starts blocked when a blocker is still open', () => {
    const blocker = runAdd({ services, title: 'Schema', json: false });
    const result = runAdd({ services, title: 'API', blockedBy: [blocker.task_id], json: false });

    expect(result.status).toBe(TaskStatus.Blocked);
    expect(result.blockers).toEqual([blocker.task_id]);
  });

  it('rejects unknown blockers', () => {
    try {
      runAdd({ services, title: 'API', blockedBy: ['nope'], json: false });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CLIError);
      if (err instanceof CLIError) expect(err.exitCode).toBe(ExitCode.NotFound);
    }
    expect(services.taskService.listTasks()).toEqual([]);
  });

  it('prints the task as JSON', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const result = runAdd({ services, title: 'Json', json: true });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual(result);
  });
});
