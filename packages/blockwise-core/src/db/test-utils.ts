/**
 * Test utilities for creating in-memory databases with the correct schema.
 */
import Database from 'better-sqlite3';
import { applySchema } from './connection.js';

export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  applySchema(db);
  return db;
}
