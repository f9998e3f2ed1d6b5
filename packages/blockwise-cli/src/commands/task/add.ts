import { Command } from 'commander';
import type { TaskPriority } from 'blockwise-core';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { collect, parseTaskPriority } from '../../parse.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';
import { toTaskView, type TaskView } from './view.js';

export type AddResult = TaskView;

interface AddCommandOptions {
  description?: string;
  project?: string;
  priority?: string;
  tag?: string[];
  blockedBy?: string[];
}

export function runAdd(options: {
  services: Services;
  title: string;
  description?: string;
  project?: string;
  priority?: TaskPriority;
  tags?: string[];
  blockedBy?: string[];
  json: boolean;
}): AddResult {
  const { services, json } = options;

  const blockers = options.blockedBy?.map((id) => resolveId(services, id));
  const task = services.taskService.createTask({
    title: options.title,
    description: options.description,
    project: options.project,
    priority: options.priority,
    tags: options.tags,
    blockers,
  });

  const result = toTaskView(task);

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ Added task ${task.id}: ${task.title}`);
    if (task.blockers.length > 0) {
      console.log(`  Blocked by: ${task.blockers.join(', ')} (status: ${task.status})`);
    }
  }

  return result;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Create a task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Task description')
    .option('-p, --project <name>', 'Project name')
    .option('--priority <level>', 'critical, high, normal, low or background')
    .option('-t, --tag <tag>', 'Tag (repeatable)', collect)
    .option('-b, --blocked-by <taskId>', 'Blocking task (repeatable)', collect)
    .action(function (this: Command, title: string, opts: AddCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        runAdd({
          services,
          title,
          description: opts.description,
          project: opts.project,
          priority: parseTaskPriority(opts.priority),
          tags: opts.tag,
          blockedBy: opts.blockedBy,
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
