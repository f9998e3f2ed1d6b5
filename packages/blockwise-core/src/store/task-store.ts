import { TaskPriority, TaskStatus } from '../events/types.js';

export interface Task {
  id: string;
  title: string;
  description: string | null;
  project: string | null;
  priority: TaskPriority;
  tags: string[];
  status: TaskStatus;
  /** Ids of the tasks this one waits on, in the order they were added. */
  blockers: string[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Storage seam the dependency engine works against.
 *
 * `get` hands out a detached copy; nothing changes until `save`.
 * `listActiveIds` excludes completed and cancelled tasks and keeps a stable order.
 */
export interface TaskStore {
  get(id: string): Task | null;
  save(task: Task): void;
  listActiveIds(): string[];
}

export function cloneTask(task: Task): Task {
  return { ...task, tags: [...task.tags], blockers: [...task.blockers] };
}

export function isActiveTask(task: Task): boolean {
  return task.status !== TaskStatus.Completed && task.status !== TaskStatus.Cancelled;
}

/**
 * Map-backed store. `put` accepts any graph, including ones the engine would
 * refuse to build, so tests can seed dangling or cyclic blocker lists.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, Task>();

  constructor(tasks: Iterable<Task> = []) {
    for (const task of tasks) this.put(task);
  }

  put(task: Task): void {
    this.tasks.set(task.id, cloneTask(task));
  }

  get(id: string): Task | null {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : null;
  }

  save(task: Task): void {
    this.tasks.set(task.id, cloneTask({ ...task, updatedAt: new Date().toISOString() }));
  }

  listActiveIds(): string[] {
    return [...this.tasks.values()].filter(isActiveTask).map((t) => t.id);
  }

  list(): Task[] {
    return [...this.tasks.values()].map(cloneTask);
  }
}

/** Builds a task with defaults; handy for seeding stores. */
export function makeTask(
  id: string,
  overrides: Partial<Omit<Task, 'id'>> = {}
): Task {
  const now = new Date().toISOString();
  return {
    id,
    title: overrides.title ?? id,
    description: overrides.description ?? null,
    project: overrides.project ?? null,
    priority: overrides.priority ?? TaskPriority.Normal,
    tags: overrides.tags ?? [],
    status: overrides.status ?? TaskStatus.Active,
    blockers: overrides.blockers ?? [],
    createdAt: overrides.createdAt ?? now,
    updatedAt: overrides.updatedAt ?? now,
  };
}
