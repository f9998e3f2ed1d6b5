import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { runDepTree } from './tree.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';

describe('runDepTree', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-dep-tree-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
  });

  afterEach(() => {
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('draws dependents under their blocker', () => {
    const root = services.taskService.createTask({ title: 'Design schema' });
    const api = services.taskService.createTask({ title: 'Build API', blockers: [root.id] });
    const ui = services.taskService.createTask({ title: 'Build UI', blockers: [api.id] });

    const result = runDepTree({ services, taskId: root.id, json: false });

    expect(result.tree).toBe(
      [
        `○ [${root.id}] Design schema`,
        `  └─ ⛔ [${api.id}] Build API`,
        `    └─ ⛔ [${ui.id}] Build UI`,
      ].join('\n')
    );
  });
});
