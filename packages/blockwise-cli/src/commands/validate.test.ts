import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { EventType } from 'blockwise-core';
import { runValidate } from './validate.js';
import { initializeDbFromPath, closeDb, type Services } from '../db.js';

describe('runValidate', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-validate-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function appendBlocker(taskId: string, blockerId: string): void {
    const event = services.eventStore.append({
      task_id: taskId,
      type: EventType.BlockerAdded,
      data: { blocker_id: blockerId },
    });
    services.projectionEngine.applyEvent(event);
  }

  it('passes a graph built through the engine', () => {
    const a = services.taskService.createTask({ title: 'A' });
    const b = services.taskService.createTask({ title: 'B' });
    services.dependencyService.addBlocker(b.id, a.id);

    const result = runValidate({ services, json: false });

    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('fails on a cycle written around the engine', () => {
    const a = services.taskService.createTask({ title: 'A' });
    const b = services.taskService.createTask({ title: 'B' });
    appendBlocker(a.id, b.id);
    appendBlocker(b.id, a.id);

    const result = runValidate({ services, json: false });

    expect(result.isValid).toBe(false);
    expect(result.cycles).toEqual([[a.id, b.id, a.id]]);
  });

  it('warns about stale blockers without failing', () => {
    const a = services.taskService.createTask({ title: 'A' });
    appendBlocker(a.id, 'GHOST');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = runValidate({ services, json: false });

    expect(result.isValid).toBe(true);
    expect(result.staleBlockers).toEqual([{ taskId: a.id, blockerId: 'GHOST' }]);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      '⚠ Found 1 issue(s):',
      `  ⚠ [stale_blocker] Task ${a.id} is blocked by non-existent task GHOST`,
    ]);
  });
});
