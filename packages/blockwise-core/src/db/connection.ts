import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { EVENTS_SCHEMA, PROJECTIONS_SCHEMA, PRAGMAS } from './schema.js';

export function applySchema(db: Database.Database): void {
  db.exec(PRAGMAS);
  db.exec(EVENTS_SCHEMA);
  db.exec(PROJECTIONS_SCHEMA);
}

export function createConnection(dbPath: string): Database.Database {
  // Handle in-memory databases
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  applySchema(db);
  return db;
}
