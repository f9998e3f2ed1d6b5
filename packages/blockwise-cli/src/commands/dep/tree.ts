import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface DepTreeResult {
  task_id: string;
  tree: string;
}

export function runDepTree(options: { services: Services; taskId: string; json: boolean }): DepTreeResult {
  const { services, taskId, json } = options;

  const result: DepTreeResult = {
    task_id: taskId,
    tree: services.dependencyService.dependencyTree(taskId),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(result.tree);
  }

  return result;
}

export function createDepTreeCommand(): Command {
  return new Command('tree')
    .description('Draw everything that waits on a task')
    .argument('<taskId>', 'Task ID or unique prefix')
    .action(function (this: Command, rawTaskId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        runDepTree({ services, taskId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
