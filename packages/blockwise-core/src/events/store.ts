import type Database from 'better-sqlite3';
import { generateId } from '../utils/id.js';
import { type EventEnvelope, type EventType, validateEventData } from './types.js';

export interface AppendEventInput {
  event_id?: string;
  task_id: string;
  type: EventType;
  data: Record<string, unknown>;
  author?: string;
  agent_id?: string;
}

export interface PersistedEventEnvelope extends EventEnvelope {
  rowid: number;
}

export interface GetByTaskIdOptions {
  afterId?: number;
  limit?: number;
}

export type EventRow = {
  id: number;
  event_id: string;
  task_id: string;
  type: EventType;
  data: string;
  author: string | null;
  agent_id: string | null;
  timestamp: string;
};

export function rowToEnvelope(row: EventRow): PersistedEventEnvelope {
  return {
    rowid: row.id,
    event_id: row.event_id,
    task_id: row.task_id,
    type: row.type,
    data: JSON.parse(row.data) as Record<string, unknown>,
    author: row.author ?? undefined,
    agent_id: row.agent_id ?? undefined,
    timestamp: row.timestamp,
  };
}

export class EventStore {
  private insertReturningStmt: Database.Statement;
  private selectByTaskStmt: Database.Statement;
  private countStmt: Database.Statement;

  constructor(db: Database.Database) {
    // Use RETURNING to get canonical DB timestamp and rowid
    this.insertReturningStmt = db.prepare(`
      INSERT INTO events (event_id, task_id, type, data, author, agent_id)
      VALUES (?, ?, ?, ?, ?, ?)
      RETURNING id, timestamp
    `);

    this.selectByTaskStmt = db.prepare(`
      SELECT * FROM events
      WHERE task_id = ? AND id > COALESCE(?, 0)
      ORDER BY id ASC
      LIMIT COALESCE(?, 1000)
    `);

    this.countStmt = db.prepare('SELECT COUNT(*) AS count FROM events');
  }

  append(input: AppendEventInput): PersistedEventEnvelope {
    validateEventData(input.type, input.data);

    const eventId = input.event_id ?? generateId();
    const row = this.insertReturningStmt.get(
      eventId,
      input.task_id,
      input.type,
      JSON.stringify(input.data),
      input.author ?? null,
      input.agent_id ?? null
    ) as { id: number; timestamp: string };

    return {
      rowid: row.id,
      event_id: eventId,
      task_id: input.task_id,
      type: input.type,
      data: input.data,
      author: input.author,
      agent_id: input.agent_id,
      timestamp: row.timestamp,
    };
  }

  getByTaskId(taskId: string, opts?: GetByTaskIdOptions): PersistedEventEnvelope[] {
    const rows = this.selectByTaskStmt.all(
      taskId,
      opts?.afterId ?? null,
      opts?.limit ?? null
    ) as EventRow[];
    return rows.map(rowToEnvelope);
  }

  count(): number {
    const row = this.countStmt.get() as { count: number };
    return row.count;
  }
}
