import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { runDepShow } from './show.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';

describe('runDepShow', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-dep-show-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
  });

  afterEach(() => {
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reports direct edges and both closures', () => {
    const a = services.taskService.createTask({ title: 'A' });
    const b = services.taskService.createTask({ title: 'B', blockers: [a.id] });
    const c = services.taskService.createTask({ title: 'C', blockers: [b.id] });

    expect(runDepShow({ services, taskId: b.id, json: false })).toEqual({
      task_id: b.id,
      blockers: [a.id],
      dependents: [c.id],
      is_blocked: true,
      blocking_count: 1,
      blocking_chain: [a.id],
      dependent_chain: [c.id],
    });

    const top = runDepShow({ services, taskId: a.id, json: false });
    expect(top.dependent_chain).toEqual([b.id, c.id]);
    expect(top.blocking_chain).toEqual([]);
  });
});
