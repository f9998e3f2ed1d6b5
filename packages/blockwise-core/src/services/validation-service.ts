import { TaskStatus } from '../events/types.js';
import type { Task, TaskStore } from '../store/task-store.js';

export interface StaleBlocker { taskId: string; blockerId: string; }
export interface StatusDrift { taskId: string; status: TaskStatus; isBlocked: boolean; }
export interface ValidationIssue { type: string; severity: 'error' | 'warning'; message: string; details?: unknown; }
export interface ValidationResult {
  isValid: boolean;
  issues: ValidationIssue[];
  cycles: string[][];
  staleBlockers: StaleBlocker[];
  statusDrift: StatusDrift[];
}

/**
 * Consistency checks over the active tasks. The dependency engine refuses
 * cycles on insert, so anything reported here was written around it.
 */
export class ValidationService {
  constructor(private store: TaskStore) {}

  /** Each cycle is listed as a path that ends on the id it started from. */
  detectCycles(): string[][] {
    const tasks = this.activeTasks();
    const cycles: string[][] = [];

    const WHITE = 0, GRAY = 1, BLACK = 2;
    const color = new Map<string, number>();
    for (const taskId of tasks.keys()) color.set(taskId, WHITE);

    const dfs = (u: string, path: string[]): void => {
      color.set(u, GRAY);
      for (const v of tasks.get(u)?.blockers ?? []) {
        if (u === v) { cycles.push([u, u]); continue; }
        if (!color.has(v)) continue;
        if (color.get(v) === GRAY) {
          const cycleStartIdx = path.indexOf(v);
          if (cycleStartIdx !== -1) cycles.push([...path.slice(cycleStartIdx), v]);
        } else if (color.get(v) === WHITE) {
          dfs(v, [...path, v]);
        }
      }
      color.set(u, BLACK);
    };

    for (const taskId of tasks.keys()) if (color.get(taskId) === WHITE) dfs(taskId, [taskId]);
    return cycles;
  }

  findStaleBlockers(): StaleBlocker[] {
    const stale: StaleBlocker[] = [];
    for (const task of this.activeTasks().values()) {
      for (const blockerId of task.blockers) {
        if (this.store.get(blockerId) === null) stale.push({ taskId: task.id, blockerId });
      }
    }
    return stale;
  }

  findStatusDrift(): StatusDrift[] {
    const drift: StatusDrift[] = [];
    const tasks = this.activeTasks();
    for (const task of tasks.values()) {
      // active tasks are exactly the live blockers
      const isBlocked = task.blockers.some((blockerId) => tasks.has(blockerId));
      if ((task.status === TaskStatus.Blocked) !== isBlocked) {
        drift.push({ taskId: task.id, status: task.status, isBlocked });
      }
    }
    return drift;
  }

  validate(): ValidationResult {
    const issues: ValidationIssue[] = [];
    const cycles = this.detectCycles();
    const staleBlockers = this.findStaleBlockers();
    const statusDrift = this.findStatusDrift();

    for (const cycle of cycles) {
      issues.push({ type: 'cycle', severity: 'error', message: `Dependency cycle detected: ${cycle.join(' -> ')}`, details: cycle });
    }
    for (const stale of staleBlockers) {
      issues.push({ type: 'stale_blocker', severity: 'warning', message: `Task ${stale.taskId} is blocked by non-existent task ${stale.blockerId}`, details: stale });
    }
    for (const drift of statusDrift) {
      const message = drift.isBlocked
        ? `Task ${drift.taskId} has live blockers but status is ${drift.status}`
        : `Task ${drift.taskId} is marked blocked but nothing blocks it`;
      issues.push({ type: 'status_drift', severity: 'warning', message, details: drift });
    }

    const isValid = !issues.some((issue) => issue.severity === 'error');
    return { isValid, issues, cycles, staleBlockers, statusDrift };
  }

  private activeTasks(): Map<string, Task> {
    const tasks = new Map<string, Task>();
    for (const id of this.store.listActiveIds()) {
      const task = this.store.get(id);
      if (task) tasks.set(id, task);
    }
    return tasks;
  }
}
