import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';
import { toTaskView, type TaskView } from './view.js';

export interface ShowResult {
  task: TaskView;
  dependents: string[];
  is_blocked: boolean;
}

export function runShow(options: { services: Services; taskId: string; json: boolean }): ShowResult {
  const { services, taskId, json } = options;

  const task = services.taskService.requireTask(taskId);
  const dependents = services.dependencyService.dependentsOf(taskId);

  const result: ShowResult = {
    task: toTaskView(task),
    dependents,
    is_blocked: services.dependencyService.isBlocked(taskId),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`Task: ${task.id}`);
    console.log(`Title: ${task.title}`);
    console.log(`Status: ${task.status}`);
    console.log(`Priority: ${task.priority}`);
    if (task.project) console.log(`Project: ${task.project}`);
    if (task.tags.length > 0) console.log(`Tags: ${task.tags.join(', ')}`);
    if (task.description) console.log(`\n${task.description}\n`);
    console.log(`Blocked by: ${task.blockers.length > 0 ? task.blockers.join(', ') : '(none)'}`);
    console.log(`Blocking: ${dependents.length > 0 ? dependents.join(', ') : '(none)'}`);
  }

  return result;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show a task')
    .argument('<taskId>', 'Task ID or unique prefix')
    .action(function (this: Command, rawTaskId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        runShow({ services, taskId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
