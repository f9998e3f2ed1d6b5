import type Database from 'better-sqlite3';
import { EventStore, type PersistedEventEnvelope } from '../events/store.js';
import {
  EventType,
  TaskStatus,
  UPDATABLE_TASK_FIELDS,
  type TaskCreatedData,
  type TaskPriority,
  type UpdatableTaskField,
} from '../events/types.js';
import { ProjectionEngine } from '../projections/engine.js';
import { selectBlockerIds } from '../projections/blockers.js';
import type { TaskRow } from '../projections/tasks-current.js';
import { withWriteTransaction } from '../db/transaction.js';
import { AmbiguousPrefixError, TaskNotFoundError } from '../errors.js';
import { generateId } from '../utils/id.js';
import type { Task, TaskStore } from './task-store.js';

export interface EventContext {
  author?: string;
  agent_id?: string;
}

export interface CreateTaskInput {
  title: string;
  description?: string;
  project?: string;
  priority?: TaskPriority;
  tags?: string[];
  blockers?: string[];
  status?: TaskStatus;
}

export interface ListTasksOptions {
  includeTerminal?: boolean;
  status?: TaskStatus;
  project?: string;
}

/**
 * Task store over the event ledger. Reads come from the `tasks_current` and
 * `task_blockers` projections; `save` turns the difference between the
 * given task and the stored one into events.
 */
export class LedgerTaskStore implements TaskStore {
  private getTaskStmt: Database.Statement;
  private activeIdsStmt: Database.Statement;
  private prefixStmt: Database.Statement;

  constructor(
    private db: Database.Database,
    private eventStore: EventStore,
    private projectionEngine: ProjectionEngine,
    private ctx: EventContext = {}
  ) {
    this.getTaskStmt = db.prepare('SELECT * FROM tasks_current WHERE task_id = ?');
    this.activeIdsStmt = db.prepare(`
      SELECT task_id FROM tasks_current
      WHERE status NOT IN ('completed', 'cancelled')
      ORDER BY created_event_id ASC
    `);
    this.prefixStmt = db.prepare(`
      SELECT task_id FROM tasks_current
      WHERE substr(task_id, 1, length(?)) = ?
      ORDER BY created_event_id ASC
      LIMIT 10
    `);
  }

  get(id: string): Task | null {
    const row = this.getTaskStmt.get(id) as TaskRow | undefined;
    return row ? this.rowToTask(row) : null;
  }

  /**
   * Resolve a full id or a unique prefix of one. Returns null when nothing
   * matches and throws AmbiguousPrefixError when several tasks do.
   */
  resolveId(idOrPrefix: string): string | null {
    if (this.getTaskStmt.get(idOrPrefix)) return idOrPrefix;

    const rows = this.prefixStmt.all(idOrPrefix, idOrPrefix) as { task_id: string }[];
    if (rows.length === 0) return null;
    if (rows.length > 1) throw new AmbiguousPrefixError(idOrPrefix, rows.map((r) => r.task_id));
    return rows[0].task_id;
  }

  listActiveIds(): string[] {
    const rows = this.activeIdsStmt.all() as { task_id: string }[];
    return rows.map((r) => r.task_id);
  }

  list(opts: ListTasksOptions = {}): Task[] {
    const conditions: string[] = [];
    const params: string[] = [];

    if (opts.status) {
      conditions.push('status = ?');
      params.push(opts.status);
    } else if (!opts.includeTerminal) {
      conditions.push("status NOT IN ('completed', 'cancelled')");
    }
    if (opts.project) {
      conditions.push('project = ?');
      params.push(opts.project);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM tasks_current ${where} ORDER BY created_event_id ASC`)
      .all(...params) as TaskRow[];
    return rows.map((row) => this.rowToTask(row));
  }

  create(input: CreateTaskInput): Task {
    const taskId = generateId();

    const eventData: TaskCreatedData = {
      title: input.title,
      description: input.description,
      project: input.project,
      priority: input.priority,
      tags: input.tags,
      blockers: input.blockers,
      status: input.status,
    };
    const cleanedEventData = Object.fromEntries(
      Object.entries(eventData).filter(([, value]) => value !== undefined)
    );

    const task = withWriteTransaction(this.db, () => {
      this.record(taskId, EventType.TaskCreated, cleanedEventData);
      return this.get(taskId);
    });

    if (!task) {
      throw new Error('Failed to create task: task not found after creation');
    }
    return task;
  }

  save(task: Task): void {
    withWriteTransaction(this.db, () => {
      const current = this.get(task.id);
      if (!current) throw new TaskNotFoundError(task.id);

      for (const blockerId of current.blockers) {
        if (!task.blockers.includes(blockerId)) {
          this.record(task.id, EventType.BlockerRemoved, { blocker_id: blockerId });
        }
      }
      for (const blockerId of task.blockers) {
        if (!current.blockers.includes(blockerId)) {
          this.record(task.id, EventType.BlockerAdded, { blocker_id: blockerId });
        }
      }

      for (const field of UPDATABLE_TASK_FIELDS) {
        const oldValue = fieldValue(current, field);
        const newValue = fieldValue(task, field);
        if (JSON.stringify(oldValue) !== JSON.stringify(newValue)) {
          this.record(task.id, EventType.TaskUpdated, {
            field,
            old_value: oldValue,
            new_value: newValue,
          });
        }
      }

      if (current.status !== task.status) {
        this.record(task.id, EventType.StatusChanged, { from: current.status, to: task.status });
      }
    });
  }

  history(id: string): PersistedEventEnvelope[] {
    return this.eventStore.getByTaskId(id);
  }

  private record(taskId: string, type: EventType, data: Record<string, unknown>): void {
    const event = this.eventStore.append({
      task_id: taskId,
      type,
      data,
      author: this.ctx.author,
      agent_id: this.ctx.agent_id,
    });
    this.projectionEngine.applyEvent(event);
  }

  private rowToTask(row: TaskRow): Task {
    return {
      id: row.task_id,
      title: row.title,
      description: row.description,
      project: row.project,
      priority: row.priority,
      tags: JSON.parse(row.tags) as string[],
      status: row.status,
      blockers: selectBlockerIds(this.db, row.task_id),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

function fieldValue(task: Task, field: UpdatableTaskField): unknown {
  switch (field) {
    case 'title':
      return task.title;
    case 'description':
      return task.description;
    case 'project':
      return task.project;
    case 'priority':
      return task.priority;
    case 'tags':
      return task.tags;
  }
}
