import type Database from 'better-sqlite3';
import type { PersistedEventEnvelope } from '../events/store.js';
import { CachingProjector } from './types.js';
import { EventType, type BlockerData, type TaskCreatedData } from '../events/types.js';

/**
 * Maintains `task_blockers`. Edges keep the row id of the event that added
 * them as their position, so a removed and re-added blocker moves to the end.
 */
export class BlockersProjector extends CachingProjector {
  name = 'task_blockers';

  apply(event: PersistedEventEnvelope, db: Database.Database): void {
    switch (event.type) {
      case EventType.TaskCreated:
        this.handleTaskCreated(event, db);
        break;
      case EventType.BlockerAdded:
        this.insert(db, event.task_id, (event.data as BlockerData).blocker_id, event.rowid);
        break;
      case EventType.BlockerRemoved:
        this.stmt(db, 'blockerRemoved', `
          DELETE FROM task_blockers WHERE task_id = ? AND blocker_id = ?
        `).run(event.task_id, (event.data as BlockerData).blocker_id);
        break;
    }
  }

  reset(db: Database.Database): void {
    db.exec('DELETE FROM task_blockers');
  }

  private handleTaskCreated(event: PersistedEventEnvelope, db: Database.Database): void {
    const blockers = (event.data as TaskCreatedData).blockers;
    if (!blockers || blockers.length === 0) return;

    for (const blockerId of blockers) {
      this.insert(db, event.task_id, blockerId, event.rowid);
    }
  }

  private insert(db: Database.Database, taskId: string, blockerId: string, position: number): void {
    this.stmt(db, 'insert', `
      INSERT OR IGNORE INTO task_blockers (task_id, blocker_id, position) VALUES (?, ?, ?)
    `).run(taskId, blockerId, position);
  }
}

/** Blocker ids of a task in the order they were added. */
export function selectBlockerIds(db: Database.Database, taskId: string): string[] {
  const rows = db
    .prepare('SELECT blocker_id FROM task_blockers WHERE task_id = ? ORDER BY position, rowid')
    .all(taskId) as { blocker_id: string }[];
  return rows.map((r) => r.blocker_id);
}
