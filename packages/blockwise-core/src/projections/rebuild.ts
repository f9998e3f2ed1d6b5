import type Database from 'better-sqlite3';
import type { ProjectionEngine } from './engine.js';

const BATCH_SIZE = 1000;

/**
 * Drop every projection and replay the full event ledger.
 * Returns the number of events replayed.
 */
export function rebuildAllProjections(
  db: Database.Database,
  engine: ProjectionEngine
): number {
  const projectors = engine.getProjectors();
  const alreadyInTransaction = db.inTransaction;

  if (!alreadyInTransaction) db.exec('BEGIN IMMEDIATE');
  try {
    for (const projector of projectors) {
      if (projector.reset) {
        projector.reset(db);
      }
    }

    db.exec('DELETE FROM projection_state');

    let lastId = 0;
    let replayed = 0;
    while (true) {
      const events = engine.getEventsSince(lastId, BATCH_SIZE);
      if (events.length === 0) break;

      for (const event of events) {
        engine.applyEvent(event);
        lastId = event.rowid;
        replayed += 1;
      }
    }

    if (!alreadyInTransaction) db.exec('COMMIT');
    return replayed;
  } catch (err) {
    if (!alreadyInTransaction) db.exec('ROLLBACK');
    throw err;
  }
}
