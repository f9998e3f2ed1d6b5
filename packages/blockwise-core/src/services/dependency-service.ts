import { TaskStatus, isTerminalStatus } from '../events/types.js';
import type { Task, TaskStore } from '../store/task-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface DependencyInfo {
  taskId: string;
  /** Tasks this one waits on. */
  blockers: string[];
  /** Active tasks waiting on this one. */
  dependents: string[];
  isBlocked: boolean;
  blockingCount: number;
}

export interface ImpactEntry {
  taskId: string;
  dependentCount: number;
}

/**
 * One consistent read of the active tasks, for callers that run several
 * aggregate queries and want them to agree with each other.
 */
export interface DependencySnapshot {
  activeIds: string[];
  tasks: Map<string, Task>;
  dependents: Map<string, string[]>;
  blocked: Map<string, boolean>;
}

export interface TaskNotFoundResult {
  ok: false;
  code: 'task_not_found';
  missingId: string;
  message: string;
}

export type AddBlockerResult =
  | { ok: true; code: 'added'; applied: true; message: string }
  | { ok: true; code: 'already_blocked'; applied: false; message: string }
  | { ok: false; code: 'circular_dependency'; cycle: string[]; message: string }
  | TaskNotFoundResult;

export type ClearBlockersResult =
  | { ok: true; code: 'cleared'; applied: true; removed: string[]; message: string }
  | { ok: true; code: 'no_blockers'; applied: false; removed: string[]; message: string }
  | TaskNotFoundResult;

export type RemoveBlockerResult =
  | { ok: true; code: 'removed'; applied: true; fullyUnblocked: boolean; message: string }
  | { ok: true; code: 'no_such_edge'; applied: false; message: string }
  | TaskNotFoundResult;

export interface UnblockResult {
  taskId: string;
  fullyUnblocked: boolean;
}

export interface UnblockFailure {
  taskId: string;
  error: unknown;
}

export interface PruneResult {
  taskId: string;
  removed: string[];
  fullyUnblocked: boolean;
}

export class UnblockDependentsError extends Error {
  constructor(
    public readonly completedTaskId: string,
    public readonly results: UnblockResult[],
    public readonly failures: UnblockFailure[]
  ) {
    super(
      `Failed to unblock ${failures.length} dependent(s) of ${completedTaskId}: ` +
        failures.map((f) => f.taskId).join(', ')
    );
  }
}

interface Frame {
  id: string;
  next: string[];
  index: number;
}

export interface DependencyServiceOptions {
  logger?: Logger;
}

/**
 * Blocker graph queries and mutations. Holds no graph of its own: edges live
 * in each task's `blockers` list and every call reads them from the store.
 */
export class DependencyService {
  private logger: Logger;

  constructor(
    private store: TaskStore,
    opts: DependencyServiceOptions = {}
  ) {
    this.logger = opts.logger ?? silentLogger();
  }

  blockersOf(id: string): string[] {
    return this.store.get(id)?.blockers ?? [];
  }

  dependentsOf(id: string): string[] {
    const dependents: string[] = [];
    for (const activeId of this.store.listActiveIds()) {
      const task = this.store.get(activeId);
      if (task && task.blockers.includes(id)) {
        dependents.push(activeId);
      }
    }
    return dependents;
  }

  isBlocked(id: string): boolean {
    const task = this.store.get(id);
    if (!task) return false;
    return this.hasLiveBlocker(task.blockers);
  }

  /** Everything upstream of `id`, nearest blockers first. */
  blockingChain(id: string): string[] {
    return this.closure(id, (current) => this.blockersOf(current));
  }

  /** Everything that transitively waits on `id`. */
  dependentChain(id: string): string[] {
    return this.closure(id, (current) => this.dependentsOf(current));
  }

  dependencyInfo(id: string): DependencyInfo | null {
    const task = this.store.get(id);
    if (!task) return null;

    const dependents = this.dependentsOf(id);
    return {
      taskId: id,
      blockers: [...task.blockers],
      dependents,
      isBlocked: this.hasLiveBlocker(task.blockers),
      blockingCount: dependents.length,
    };
  }

  addBlocker(taskId: string, blockerId: string): AddBlockerResult {
    const task = this.store.get(taskId);
    if (!task) return notFound(taskId, `Task not found: ${taskId}`);

    const blocker = this.store.get(blockerId);
    if (!blocker) return notFound(blockerId, `Blocker not found: ${blockerId}`);

    const cycle = this.findCyclePath(taskId, blockerId);
    if (cycle) {
      this.logger.debug({ taskId, blockerId, cycle }, 'blocker rejected: cycle');
      return {
        ok: false,
        code: 'circular_dependency',
        cycle,
        message: `Would create circular dependency: ${cycle.join(' -> ')}`,
      };
    }

    if (task.blockers.includes(blockerId)) {
      return {
        ok: true,
        code: 'already_blocked',
        applied: false,
        message: `[${blockerId}] already blocks [${taskId}]`,
      };
    }

    task.blockers.push(blockerId);
    if (!isTerminalStatus(blocker.status)) {
      task.status = TaskStatus.Blocked;
    }
    this.store.save(task);
    this.logger.debug({ taskId, blockerId, status: task.status }, 'blocker added');

    return {
      ok: true,
      code: 'added',
      applied: true,
      message: `Added blocker [${blockerId}] to [${taskId}]`,
    };
  }

  removeBlocker(taskId: string, blockerId: string): RemoveBlockerResult {
    const task = this.store.get(taskId);
    if (!task) return notFound(taskId, `Task not found: ${taskId}`);

    if (!task.blockers.includes(blockerId)) {
      return {
        ok: true,
        code: 'no_such_edge',
        applied: false,
        message: `[${blockerId}] does not block [${taskId}]`,
      };
    }

    task.blockers = task.blockers.filter((id) => id !== blockerId);
    const fullyUnblocked = this.releaseIfClear(task);
    this.store.save(task);
    this.logger.debug({ taskId, blockerId, fullyUnblocked }, 'blocker removed');

    return {
      ok: true,
      code: 'removed',
      applied: true,
      fullyUnblocked,
      message: `Removed blocker [${blockerId}] from [${taskId}]`,
    };
  }

  /** Drop every blocker of `taskId` at once; the task is left paused if it was blocked. */
  clearBlockers(taskId: string): ClearBlockersResult {
    const task = this.store.get(taskId);
    if (!task) return notFound(taskId, `Task not found: ${taskId}`);

    if (task.blockers.length === 0) {
      return {
        ok: true,
        code: 'no_blockers',
        applied: false,
        removed: [],
        message: `[${taskId}] has no blockers`,
      };
    }

    const removed = task.blockers;
    task.blockers = [];
    this.releaseIfClear(task);
    this.store.save(task);
    this.logger.debug({ taskId, removed }, 'blockers cleared');

    return {
      ok: true,
      code: 'cleared',
      applied: true,
      removed,
      message: `Removed all ${removed.length} blocker(s) from [${taskId}]`,
    };
  }

  /**
   * Drop `completedTaskId` from every dependent's blocker list. Each
   * dependent is saved on its own; failures are collected and reported
   * together once the rest of the batch has been written.
   */
  unblockDependents(completedTaskId: string): UnblockResult[] {
    const results: UnblockResult[] = [];
    const failures: UnblockFailure[] = [];

    for (const dependentId of this.dependentsOf(completedTaskId)) {
      const task = this.store.get(dependentId);
      if (!task || !task.blockers.includes(completedTaskId)) continue;

      task.blockers = task.blockers.filter((id) => id !== completedTaskId);
      const fullyUnblocked = this.releaseIfClear(task);

      try {
        this.store.save(task);
      } catch (error) {
        this.logger.warn({ err: error, taskId: dependentId, completedTaskId }, 'failed to unblock dependent');
        failures.push({ taskId: dependentId, error });
        continue;
      }
      results.push({ taskId: dependentId, fullyUnblocked });
    }

    if (failures.length > 0) {
      throw new UnblockDependentsError(completedTaskId, results, failures);
    }
    this.logger.debug({ completedTaskId, unblocked: results.length }, 'dependents unblocked');
    return results;
  }

  snapshot(): DependencySnapshot {
    const tasks = new Map<string, Task>();
    const dependents = new Map<string, string[]>();
    const activeIds: string[] = [];

    for (const id of this.store.listActiveIds()) {
      const task = this.store.get(id);
      if (!task) continue;
      tasks.set(id, task);
      activeIds.push(id);
      dependents.set(id, dependents.get(id) ?? []);
    }

    for (const id of activeIds) {
      for (const blockerId of tasks.get(id)?.blockers ?? []) {
        const list = dependents.get(blockerId);
        if (list) list.push(id);
        else dependents.set(blockerId, [id]);
      }
    }

    // Resolve each blocker's status once; terminal and missing tasks never block.
    const live = new Map<string, boolean>();
    const isLive = (blockerId: string): boolean => {
      let cached = live.get(blockerId);
      if (cached === undefined) {
        const blocker = tasks.get(blockerId) ?? this.store.get(blockerId);
        cached = blocker !== null && blocker !== undefined && !isTerminalStatus(blocker.status);
        live.set(blockerId, cached);
      }
      return cached;
    };

    const blocked = new Map<string, boolean>();
    for (const id of activeIds) {
      blocked.set(id, (tasks.get(id)?.blockers ?? []).some(isLive));
    }

    return { activeIds, tasks, dependents, blocked };
  }

  allDependencyInfo(snapshot: DependencySnapshot = this.snapshot()): Map<string, DependencyInfo> {
    const result = new Map<string, DependencyInfo>();
    for (const id of snapshot.activeIds) {
      const task = snapshot.tasks.get(id);
      if (!task) continue;
      const dependents = snapshot.dependents.get(id) ?? [];
      result.set(id, {
        taskId: id,
        blockers: [...task.blockers],
        dependents: [...dependents],
        isBlocked: snapshot.blocked.get(id) ?? false,
        blockingCount: dependents.length,
      });
    }
    return result;
  }

  /** Active tasks with at least `minDependents` dependents, most dependents first. */
  highImpactBlockers(minDependents = 2, snapshot?: DependencySnapshot): ImpactEntry[] {
    const entries: ImpactEntry[] = [];
    for (const info of this.allDependencyInfo(snapshot).values()) {
      if (info.blockingCount >= minDependents) {
        entries.push({ taskId: info.taskId, dependentCount: info.blockingCount });
      }
    }
    return entries.sort((a, b) => b.dependentCount - a.dependentCount);
  }

  dependencyTree(id: string): string {
    const lines: string[] = [];
    const visited = new Set<string>();
    const stack: { id: string; depth: number }[] = [{ id, depth: 0 }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry || visited.has(entry.id)) continue;
      visited.add(entry.id);

      const task = this.store.get(entry.id);
      if (!task) continue;

      const indent = '  '.repeat(entry.depth);
      const prefix = entry.depth > 0 ? '└─ ' : '';
      lines.push(`${indent}${prefix}${statusIcon(task.status)} [${task.id}] ${truncate(task.title, 40)}`);

      const children = this.dependentsOf(entry.id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ id: children[i], depth: entry.depth + 1 });
      }
    }

    return lines.join('\n');
  }

  /** Remove blocker ids that no longer resolve to a task. */
  pruneStaleBlockers(): PruneResult[] {
    const results: PruneResult[] = [];

    for (const id of this.store.listActiveIds()) {
      const task = this.store.get(id);
      if (!task) continue;

      const removed = task.blockers.filter((blockerId) => this.store.get(blockerId) === null);
      if (removed.length === 0) continue;

      task.blockers = task.blockers.filter((blockerId) => !removed.includes(blockerId));
      const fullyUnblocked = this.releaseIfClear(task);
      this.store.save(task);
      this.logger.debug({ taskId: id, removed }, 'stale blockers pruned');
      results.push({ taskId: id, removed, fullyUnblocked });
    }

    return results;
  }

  private hasLiveBlocker(blockers: string[]): boolean {
    return blockers.some((blockerId) => {
      const blocker = this.store.get(blockerId);
      return blocker !== null && !isTerminalStatus(blocker.status);
    });
  }

  /** Moves a blocked task to paused once nothing blocks it. Returns whether it is clear. */
  private releaseIfClear(task: Task): boolean {
    const clear = !this.hasLiveBlocker(task.blockers);
    if (clear && task.status === TaskStatus.Blocked) {
      task.status = TaskStatus.Paused;
    }
    return clear;
  }

  /**
   * Depth-first search from `blockerId` through blockers. Returns the path
   * that would close a cycle if `blockerId` started blocking `taskId`, or
   * null when the edge is safe.
   */
  private findCyclePath(taskId: string, blockerId: string): string[] | null {
    if (blockerId === taskId) return [blockerId, blockerId];

    const visited = new Set<string>([blockerId]);
    const frames: Frame[] = [{ id: blockerId, next: this.blockersOf(blockerId), index: 0 }];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.index >= frame.next.length) {
        frames.pop();
        continue;
      }

      const candidate = frame.next[frame.index++];
      if (candidate === taskId) {
        return [...frames.map((f) => f.id), taskId, taskId];
      }
      if (visited.has(candidate)) continue;

      visited.add(candidate);
      frames.push({ id: candidate, next: this.blockersOf(candidate), index: 0 });
    }

    return null;
  }

  /**
   * Pre-order closure of `start` under `neighbours`. Each id is emitted once;
   * `start` appears only when a cycle leads back to it, and is never expanded
   * a second time.
   */
  private closure(start: string, neighbours: (id: string) => string[]): string[] {
    const result: string[] = [];
    const emitted = new Set<string>();
    const expanded = new Set<string>([start]);
    const frames: Frame[] = [{ id: start, next: neighbours(start), index: 0 }];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.index >= frame.next.length) {
        frames.pop();
        continue;
      }

      const candidate = frame.next[frame.index++];
      if (!emitted.has(candidate)) {
        emitted.add(candidate);
        result.push(candidate);
      }
      if (expanded.has(candidate)) continue;

      expanded.add(candidate);
      frames.push({ id: candidate, next: neighbours(candidate), index: 0 });
    }

    return result;
  }
}

function notFound(missingId: string, message: string): TaskNotFoundResult {
  return { ok: false, code: 'task_not_found', missingId, message };
}

/** Cuts by code point so surrogate pairs are never split. */
function truncate(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

function statusIcon(status: TaskStatus): string {
  if (status === TaskStatus.Completed) return '✓';
  if (status === TaskStatus.Blocked) return '⛔';
  return '○';
}
