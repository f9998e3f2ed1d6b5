import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { rebuildAllProjections } from './rebuild.js';
import { ProjectionEngine } from './engine.js';
import { TasksCurrentProjector, type TaskRow } from './tasks-current.js';
import { BlockersProjector, selectBlockerIds } from './blockers.js';
import { createTestDb } from '../db/test-utils.js';
import { EventStore } from '../events/store.js';
import { EventType, TaskStatus } from '../events/types.js';

describe('rebuildAllProjections', () => {
  let db: Database.Database;
  let eventStore: EventStore;
  let engine: ProjectionEngine;

  beforeEach(() => {
    db = createTestDb();
    eventStore = new EventStore(db);
    engine = new ProjectionEngine(db);
    engine.register(new TasksCurrentProjector());
    engine.register(new BlockersProjector());
  });

  afterEach(() => {
    db.close();
  });

  it('restores projections from the ledger', () => {
    engine.applyEvent(
      eventStore.append({ task_id: 'A', type: EventType.TaskCreated, data: { title: 'Blocker' } })
    );
    engine.applyEvent(
      eventStore.append({
        task_id: 'B',
        type: EventType.TaskCreated,
        data: { title: 'Dependent', blockers: ['A'], status: TaskStatus.Blocked },
      })
    );
    const last = eventStore.append({
      task_id: 'A',
      type: EventType.StatusChanged,
      data: { from: TaskStatus.Active, to: TaskStatus.Completed },
    });
    engine.applyEvent(last);

    db.exec('DELETE FROM tasks_current');
    db.exec('DELETE FROM task_blockers');

    expect(rebuildAllProjections(db, engine)).toBe(3);

    const a = db.prepare('SELECT * FROM tasks_current WHERE task_id = ?').get('A') as TaskRow;
    expect(a.status).toBe('completed');
    expect(selectBlockerIds(db, 'B')).toEqual(['A']);
    expect(engine.getProjectionState('task_blockers')?.last_event_id).toBe(last.rowid);
  });

  it('runs inside an enclosing transaction without committing it', () => {
    engine.applyEvent(
      eventStore.append({ task_id: 'A', type: EventType.TaskCreated, data: { title: 'Only' } })
    );

    db.exec('BEGIN');
    rebuildAllProjections(db, engine);
    expect(db.inTransaction).toBe(true);
    db.exec('ROLLBACK');
  });
});
