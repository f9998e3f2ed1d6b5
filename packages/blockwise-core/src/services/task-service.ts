import type { PersistedEventEnvelope } from '../events/store.js';
import { TaskStatus, isTerminalStatus } from '../events/types.js';
import {
  InvalidStatusTransitionError,
  TaskBlockedError,
  TaskNotFoundError,
} from '../errors.js';
import type {
  CreateTaskInput,
  LedgerTaskStore,
  ListTasksOptions,
} from '../store/ledger-task-store.js';
import type { Task } from '../store/task-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { DependencyService, UnblockResult } from './dependency-service.js';

export type NewTaskInput = Omit<CreateTaskInput, 'status'>;

export interface FinishTaskResult {
  task: Task;
  /** Dependents that lost this task as a blocker. */
  unblocked: UnblockResult[];
}

export class TaskService {
  private logger: Logger;

  constructor(
    private store: LedgerTaskStore,
    private dependencies: DependencyService,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? silentLogger();
  }

  createTask(input: NewTaskInput): Task {
    let blocked = false;
    for (const blockerId of input.blockers ?? []) {
      const blocker = this.store.get(blockerId);
      if (!blocker) throw new TaskNotFoundError(blockerId);
      if (!isTerminalStatus(blocker.status)) blocked = true;
    }

    const task = this.store.create({
      ...input,
      status: blocked ? TaskStatus.Blocked : TaskStatus.Active,
    });
    this.logger.info({ taskId: task.id, status: task.status }, 'task created');
    return task;
  }

  /** Full id for an id or unique prefix; null when nothing matches. */
  resolveTaskId(idOrPrefix: string): string | null {
    return this.store.resolveId(idOrPrefix);
  }

  getTask(id: string): Task | null {
    return this.store.get(id);
  }

  requireTask(id: string): Task {
    const task = this.store.get(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  listTasks(opts: ListTasksOptions = {}): Task[] {
    return this.store.list(opts);
  }

  /** Only active tasks can be paused; pausing a paused task is a no-op. */
  pauseTask(id: string): Task {
    const task = this.requireTask(id);
    if (task.status === TaskStatus.Paused) return task;
    if (task.status !== TaskStatus.Active) {
      throw new InvalidStatusTransitionError(id, task.status, TaskStatus.Paused);
    }
    return this.transition(task, TaskStatus.Paused);
  }

  resumeTask(id: string): Task {
    const task = this.requireTask(id);
    if (task.status === TaskStatus.Active) return task;
    if (isTerminalStatus(task.status)) {
      throw new InvalidStatusTransitionError(id, task.status, TaskStatus.Active);
    }

    const blocking = this.liveBlockers(task);
    if (blocking.length > 0) throw new TaskBlockedError(id, blocking);

    return this.transition(task, TaskStatus.Active);
  }

  completeTask(id: string): FinishTaskResult {
    return this.finish(id, TaskStatus.Completed);
  }

  cancelTask(id: string): FinishTaskResult {
    return this.finish(id, TaskStatus.Cancelled);
  }

  history(id: string): PersistedEventEnvelope[] {
    this.requireTask(id);
    return this.store.history(id);
  }

  private finish(id: string, to: TaskStatus.Completed | TaskStatus.Cancelled): FinishTaskResult {
    const task = this.requireTask(id);
    if (isTerminalStatus(task.status)) {
      throw new InvalidStatusTransitionError(id, task.status, to);
    }

    const finished = this.transition(task, to);
    const unblocked = this.dependencies.unblockDependents(id);
    this.logger.info({ taskId: id, status: to, unblocked: unblocked.length }, 'task finished');
    return { task: finished, unblocked };
  }

  private transition(task: Task, to: TaskStatus): Task {
    this.store.save({ ...task, status: to });
    return this.requireTask(task.id);
  }

  private liveBlockers(task: Task): string[] {
    return task.blockers.filter((blockerId) => {
      const blocker = this.store.get(blockerId);
      return blocker !== null && !isTerminalStatus(blocker.status);
    });
  }
}
