import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface DepPruneResult {
  pruned: { task_id: string; removed: string[]; fully_unblocked: boolean }[];
  total: number;
}

export function runDepPrune(options: { services: Services; json: boolean }): DepPruneResult {
  const { services, json } = options;

  const pruned = services.dependencyService.pruneStaleBlockers().map((entry) => ({
    task_id: entry.taskId,
    removed: entry.removed,
    fully_unblocked: entry.fullyUnblocked,
  }));
  const result: DepPruneResult = {
    pruned,
    total: pruned.reduce((sum, entry) => sum + entry.removed.length, 0),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else if (result.total === 0) {
    console.log('No stale blockers');
  } else {
    console.log(`✓ Removed ${result.total} stale blocker(s)`);
    for (const entry of pruned) {
      console.log(`  ${entry.task_id}: ${entry.removed.join(', ')}`);
    }
  }

  return result;
}

export function createDepPruneCommand(): Command {
  return new Command('prune')
    .description('Drop blocker ids that no longer name a task')
    .action(function (this: Command) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        runDepPrune({ services, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
