import { Command } from 'commander';
import type { FinishTaskResult } from 'blockwise-core';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface FinishResult {
  task_id: string;
  title: string;
  status: string;
  unblocked: { task_id: string; fully_unblocked: boolean }[];
}

function report(finished: FinishTaskResult, verb: string, json: boolean): FinishResult {
  const result: FinishResult = {
    task_id: finished.task.id,
    title: finished.task.title,
    status: finished.task.status,
    unblocked: finished.unblocked.map((entry) => ({
      task_id: entry.taskId,
      fully_unblocked: entry.fullyUnblocked,
    })),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${verb} task ${result.task_id}: ${result.title}`);
    for (const entry of result.unblocked) {
      const state = entry.fully_unblocked ? 'unblocked' : 'still blocked';
      console.log(`  ${entry.task_id}: ${state}`);
    }
  }

  return result;
}

export function runComplete(options: { services: Services; taskId: string; json: boolean }): FinishResult {
  return report(options.services.taskService.completeTask(options.taskId), 'Completed', options.json);
}

export function runCancel(options: { services: Services; taskId: string; json: boolean }): FinishResult {
  return report(options.services.taskService.cancelTask(options.taskId), 'Cancelled', options.json);
}

function createFinishCommand(
  name: string,
  description: string,
  run: (options: { services: Services; taskId: string; json: boolean }) => FinishResult
): Command {
  return new Command(name)
    .description(description)
    .argument('<taskId>', 'Task ID or unique prefix')
    .action(function (this: Command, rawTaskId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        run({ services, taskId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}

export function createCompleteCommand(): Command {
  return createFinishCommand('complete', 'Complete a task and release its dependents', runComplete);
}

export function createCancelCommand(): Command {
  return createFinishCommand('cancel', 'Cancel a task and release its dependents', runCancel);
}
