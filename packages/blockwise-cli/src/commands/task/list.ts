import { Command } from 'commander';
import type { TaskStatus } from 'blockwise-core';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { parseTaskStatus } from '../../parse.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface TaskListItem {
  task_id: string;
  title: string;
  project: string | null;
  priority: string;
  status: string;
  blockers: string[];
}

export interface ListResult {
  tasks: TaskListItem[];
  total: number;
}

interface ListCommandOptions {
  all?: boolean;
  status?: string;
  project?: string;
}

export function runList(options: {
  services: Services;
  includeTerminal?: boolean;
  status?: TaskStatus;
  project?: string;
  json: boolean;
}): ListResult {
  const { services, json } = options;

  const tasks = services.taskService.listTasks({
    includeTerminal: options.includeTerminal,
    status: options.status,
    project: options.project,
  });

  const result: ListResult = {
    tasks: tasks.map((task) => ({
      task_id: task.id,
      title: task.title,
      project: task.project,
      priority: task.priority,
      status: task.status,
      blockers: task.blockers,
    })),
    total: tasks.length,
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else if (result.total === 0) {
    console.log('No tasks found');
  } else {
    for (const task of result.tasks) {
      const project = task.project ? ` #${task.project}` : '';
      console.log(`[${task.task_id}] ${task.title} (${task.status})${project}`);
      if (task.blockers.length > 0) {
        console.log(`  blocked by: ${task.blockers.join(', ')}`);
      }
    }
  }

  return result;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks (completed and cancelled are hidden unless --all)')
    .option('-a, --all', 'Include completed and cancelled tasks', false)
    .option('-s, --status <status>', 'Only tasks with this status')
    .option('-p, --project <name>', 'Only tasks in this project')
    .action(function (this: Command, opts: ListCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        runList({
          services,
          includeTerminal: opts.all,
          status: parseTaskStatus(opts.status),
          project: opts.project,
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
