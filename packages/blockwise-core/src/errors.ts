import type { TaskStatus } from './events/types.js';

export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus
  ) {
    super(`Cannot move task ${taskId} from ${from} to ${to}`);
  }
}

export class TaskBlockedError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly blockingIds: string[]
  ) {
    super(`Task ${taskId} is blocked by: ${blockingIds.join(', ')}`);
  }
}

export class AmbiguousPrefixError extends Error {
  constructor(
    public readonly prefix: string,
    public readonly matches: string[]
  ) {
    super(`Ambiguous task id prefix '${prefix}' matches ${matches.length} tasks`);
  }
}
