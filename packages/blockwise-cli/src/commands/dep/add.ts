import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { CLIError, ExitCode, handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface DepAddResult {
  task_id: string;
  blocker_id: string;
  code: 'added' | 'already_blocked';
  applied: boolean;
  status: string;
  message: string;
}

export function runDepAdd(options: {
  services: Services;
  taskId: string;
  blockerId: string;
  json: boolean;
}): DepAddResult {
  const { services, taskId, blockerId, json } = options;

  const outcome = services.dependencyService.addBlocker(taskId, blockerId);
  if (!outcome.ok) {
    if (outcome.code === 'circular_dependency') {
      throw new CLIError(
        outcome.message,
        ExitCode.InvalidInput,
        'circular_dependency',
        { task_id: taskId, blocker_id: blockerId, cycle: outcome.cycle },
        [`blockwise dep show ${blockerId}`]
      );
    }
    throw new CLIError(outcome.message, ExitCode.NotFound, undefined, { task_id: outcome.missingId });
  }

  const result: DepAddResult = {
    task_id: taskId,
    blocker_id: blockerId,
    code: outcome.code,
    applied: outcome.applied,
    status: services.taskService.requireTask(taskId).status,
    message: outcome.message,
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`${outcome.applied ? '✓' : '•'} ${outcome.message}`);
  }

  return result;
}

export function createDepAddCommand(): Command {
  return new Command('add')
    .description('Make one task wait on another')
    .argument('<taskId>', 'Task that waits')
    .argument('<blockerId>', 'Task it waits on')
    .action(function (this: Command, rawTaskId: string, rawBlockerId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        const blockerId = resolveId(services, rawBlockerId);
        runDepAdd({ services, taskId, blockerId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
