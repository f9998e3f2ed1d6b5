import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface DepShowResult {
  task_id: string;
  blockers: string[];
  dependents: string[];
  is_blocked: boolean;
  blocking_count: number;
  blocking_chain: string[];
  dependent_chain: string[];
}

export function runDepShow(options: { services: Services; taskId: string; json: boolean }): DepShowResult {
  const { services, taskId, json } = options;
  const deps = services.dependencyService;

  const task = services.taskService.requireTask(taskId);
  const dependents = deps.dependentsOf(taskId);

  const result: DepShowResult = {
    task_id: taskId,
    blockers: task.blockers,
    dependents,
    is_blocked: deps.isBlocked(taskId),
    blocking_count: dependents.length,
    blocking_chain: deps.blockingChain(taskId),
    dependent_chain: deps.dependentChain(taskId),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    const list = (ids: string[]) => (ids.length > 0 ? ids.join(', ') : '(none)');
    console.log(`Task: ${taskId}${result.is_blocked ? ' (blocked)' : ''}`);
    console.log(`Blocked by: ${list(result.blockers)}`);
    console.log(`Blocking: ${list(result.dependents)}`);
    console.log(`Upstream: ${list(result.blocking_chain)}`);
    console.log(`Downstream: ${list(result.dependent_chain)}`);
  }

  return result;
}

export function createDepShowCommand(): Command {
  return new Command('show')
    .description("Show a task's blockers, dependents and both closures")
    .argument('<taskId>', 'Task ID or unique prefix')
    .action(function (this: Command, rawTaskId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        runDepShow({ services, taskId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
