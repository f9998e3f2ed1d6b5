import { Command } from 'commander';
import type { Task } from 'blockwise-core';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface StatusResult {
  task_id: string;
  title: string;
  status: string;
}

function toStatusResult(task: Task): StatusResult {
  return { task_id: task.id, title: task.title, status: task.status };
}

function print(result: StatusResult, verb: string, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${verb} task ${result.task_id}: ${result.title} (${result.status})`);
  }
}

export function runPause(options: { services: Services; taskId: string; json: boolean }): StatusResult {
  const result = toStatusResult(options.services.taskService.pauseTask(options.taskId));
  print(result, 'Paused', options.json);
  return result;
}

export function runResume(options: { services: Services; taskId: string; json: boolean }): StatusResult {
  const result = toStatusResult(options.services.taskService.resumeTask(options.taskId));
  print(result, 'Resumed', options.json);
  return result;
}

function createStatusCommand(
  name: string,
  description: string,
  run: (options: { services: Services; taskId: string; json: boolean }) => StatusResult
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

export function createPauseCommand(): Command {
  return createStatusCommand('pause', 'Pause an active task', runPause);
}

export function createResumeCommand(): Command {
  return createStatusCommand('resume', 'Resume a paused task once nothing blocks it', runResume);
}
