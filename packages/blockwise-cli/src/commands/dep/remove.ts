import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { CLIError, ExitCode, handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface DepRemoveResult {
  task_id: string;
  /** Null when every blocker was dropped at once. */
  blocker_id: string | null;
  code: 'removed' | 'no_such_edge' | 'cleared' | 'no_blockers';
  applied: boolean;
  removed: string[];
  fully_unblocked: boolean;
  message: string;
}

export function runDepRemove(options: {
  services: Services;
  taskId: string;
  blockerId?: string;
  json: boolean;
}): DepRemoveResult {
  const { services, taskId, blockerId, json } = options;
  const result = blockerId === undefined ? clearAll(services, taskId) : removeOne(services, taskId, blockerId);

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`${result.applied ? '✓' : '•'} ${result.message}`);
    if (result.fully_unblocked) {
      console.log(`  ${taskId} has no open blockers left`);
    }
  }

  return result;
}

function removeOne(services: Services, taskId: string, blockerId: string): DepRemoveResult {
  const outcome = services.dependencyService.removeBlocker(taskId, blockerId);
  if (!outcome.ok) {
    throw new CLIError(outcome.message, ExitCode.NotFound, undefined, { task_id: outcome.missingId });
  }
  return {
    task_id: taskId,
    blocker_id: blockerId,
    code: outcome.code,
    applied: outcome.applied,
    removed: outcome.applied ? [blockerId] : [],
    fully_unblocked: outcome.code === 'removed' ? outcome.fullyUnblocked : false,
    message: outcome.message,
  };
}

function clearAll(services: Services, taskId: string): DepRemoveResult {
  const outcome = services.dependencyService.clearBlockers(taskId);
  if (!outcome.ok) {
    throw new CLIError(outcome.message, ExitCode.NotFound, undefined, { task_id: outcome.missingId });
  }
  return {
    task_id: taskId,
    blocker_id: null,
    code: outcome.code,
    applied: outcome.applied,
    removed: outcome.removed,
    fully_unblocked: outcome.applied,
    message: outcome.message,
  };
}

export function createDepRemoveCommand(): Command {
  return new Command('remove')
    .description('Stop a task waiting on another, or on anything at all')
    .argument('<taskId>', 'Task that waits')
    .argument('[blockerId]', 'Task it waits on; omit to drop every blocker')
    .action(function (this: Command, rawTaskId: string, rawBlockerId: string | undefined) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        // The blocker may already be gone from the store; fall back to the raw id.
        const blockerId =
          rawBlockerId === undefined ? undefined : (services.taskService.resolveTaskId(rawBlockerId) ?? rawBlockerId);
        runDepRemove({ services, taskId, blockerId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
