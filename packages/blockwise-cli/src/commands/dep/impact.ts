import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { parseIntegerWithDefault } from '../../parse.js';
import { escapeMd } from '../../output.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface ImpactItem {
  task_id: string;
  title: string;
  status: string;
  dependent_count: number;
}

export interface DepImpactResult {
  min_dependents: number;
  blockers: ImpactItem[];
}

interface ImpactCommandOptions {
  min?: string;
}

export function runDepImpact(options: {
  services: Services;
  minDependents: number;
  json: boolean;
}): DepImpactResult {
  const { services, minDependents, json } = options;
  const deps = services.dependencyService;

  const snapshot = deps.snapshot();
  const blockers: ImpactItem[] = [];
  for (const entry of deps.highImpactBlockers(minDependents, snapshot)) {
    const task = snapshot.tasks.get(entry.taskId);
    if (!task) continue;
    blockers.push({
      task_id: entry.taskId,
      title: task.title,
      status: task.status,
      dependent_count: entry.dependentCount,
    });
  }

  const result: DepImpactResult = { min_dependents: minDependents, blockers };

  if (json) {
    console.log(JSON.stringify(result));
  } else if (blockers.length === 0) {
    console.log(`No task blocks ${minDependents} or more others`);
  } else {
    console.log('| Task | Title | Status | Dependents |');
    console.log('| --- | --- | --- | --- |');
    for (const item of blockers) {
      console.log(`| ${item.task_id} | ${escapeMd(item.title)} | ${item.status} | ${item.dependent_count} |`);
    }
  }

  return result;
}

export function createDepImpactCommand(): Command {
  return new Command('impact')
    .description('Rank the tasks that hold up the most others')
    .option('--min <n>', 'Minimum number of dependents', '2')
    .action(function (this: Command, opts: ImpactCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        runDepImpact({
          services,
          minDependents: parseIntegerWithDefault(opts.min, 'min', 2, { min: 1 }),
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
