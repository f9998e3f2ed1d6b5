import type Database from 'better-sqlite3';
import type { PersistedEventEnvelope } from '../events/store.js';
import { CachingProjector } from './types.js';
import {
  EventType,
  TaskPriority,
  TaskStatus,
  isTerminalStatus,
  type StatusChangedData,
  type TaskCreatedData,
  type TaskUpdatedData,
} from '../events/types.js';

export interface TaskRow {
  task_id: string;
  title: string;
  description: string | null;
  project: string | null;
  priority: TaskPriority;
  tags: string;
  status: TaskStatus;
  terminal_at: string | null;
  created_at: string;
  updated_at: string;
  created_event_id: number;
  last_event_id: number;
}

export class TasksCurrentProjector extends CachingProjector {
  name = 'tasks_current';

  apply(event: PersistedEventEnvelope, db: Database.Database): void {
    switch (event.type) {
      case EventType.TaskCreated:
        this.handleTaskCreated(event, db);
        break;
      case EventType.StatusChanged:
        this.handleStatusChanged(event, db);
        break;
      case EventType.TaskUpdated:
        this.handleTaskUpdated(event, db);
        break;
      case EventType.BlockerAdded:
      case EventType.BlockerRemoved:
        this.touch(event, db);
        break;
    }
  }

  reset(db: Database.Database): void {
    db.exec('DELETE FROM tasks_current');
  }

  private handleTaskCreated(event: PersistedEventEnvelope, db: Database.Database): void {
    const data = event.data as TaskCreatedData;
    const status = data.status ?? TaskStatus.Active;
    this.stmt(db, 'taskCreated', `
      INSERT INTO tasks_current (
        task_id, title, description, project, priority, tags, status,
        terminal_at, created_at, updated_at, created_event_id, last_event_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.task_id,
      data.title,
      data.description ?? null,
      data.project ?? null,
      data.priority ?? TaskPriority.Normal,
      JSON.stringify(data.tags ?? []),
      status,
      isTerminalStatus(status) ? event.timestamp : null,
      event.timestamp,
      event.timestamp,
      event.rowid,
      event.rowid
    );
  }

  private handleStatusChanged(event: PersistedEventEnvelope, db: Database.Database): void {
    const data = event.data as StatusChangedData;
    const isTerminal = isTerminalStatus(data.to);

    // terminal_at is cleared if a task ever leaves a terminal status
    this.stmt(db, 'statusChanged', `
      UPDATE tasks_current SET
        status = ?,
        terminal_at = CASE WHEN ? THEN ? ELSE NULL END,
        updated_at = ?,
        last_event_id = ?
      WHERE task_id = ?
    `).run(
      data.to,
      isTerminal ? 1 : 0,
      event.timestamp,
      event.timestamp,
      event.rowid,
      event.task_id
    );
  }

  private handleTaskUpdated(event: PersistedEventEnvelope, db: Database.Database): void {
    const data = event.data as TaskUpdatedData;
    const newValue = data.field === 'tags' ? JSON.stringify(data.new_value) : data.new_value;

    // field is constrained to UPDATABLE_TASK_FIELDS by the event schema
    this.stmt(db, `taskUpdated:${data.field}`, `
      UPDATE tasks_current SET
        ${data.field} = ?,
        updated_at = ?,
        last_event_id = ?
      WHERE task_id = ?
    `).run(newValue, event.timestamp, event.rowid, event.task_id);
  }

  private touch(event: PersistedEventEnvelope, db: Database.Database): void {
    this.stmt(db, 'touch', `
      UPDATE tasks_current SET updated_at = ?, last_event_id = ? WHERE task_id = ?
    `).run(event.timestamp, event.rowid, event.task_id);
  }
}
