import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { EventType, TaskStatus } from 'blockwise-core';
import { runDepPrune } from './prune.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';

describe('runDepPrune', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-dep-prune-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
  });

  afterEach(() => {
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('removes blocker ids that name no task', () => {
    const live = services.taskService.createTask({ title: 'Live' });
    const task = services.taskService.createTask({ title: 'Task', blockers: [live.id] });
    const event = services.eventStore.append({
      task_id: task.id,
      type: EventType.BlockerAdded,
      data: { blocker_id: 'GHOST' },
    });
    services.projectionEngine.applyEvent(event);

    const result = runDepPrune({ services, json: false });

    expect(result).toEqual({
      pruned: [{ task_id: task.id, removed: ['GHOST'], fully_unblocked: false }],
      total: 1,
    });
    const after = services.taskService.getTask(task.id);
    expect(after?.blockers).toEqual([live.id]);
    expect(after?.status).toBe(TaskStatus.Blocked);
  });

  it('does nothing on a clean graph', () => {
    services.taskService.createTask({ title: 'Only' });
    expect(runDepPrune({ services, json: false })).toEqual({ pruned: [], total: 0 });
  });
});
