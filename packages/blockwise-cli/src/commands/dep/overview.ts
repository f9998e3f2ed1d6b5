import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { GlobalOptionsSchema } from '../../types.js';

const TEXT_SECTION_LIMIT = 5;
const TEXT_BLOCKER_LIMIT = 3;
const TREE_COUNT = 2;

export interface OverviewImpactItem {
  task_id: string;
  title: string;
  dependent_count: number;
}

export interface OverviewBlockedItem {
  task_id: string;
  title: string;
  blockers: string[];
}

export interface OverviewTree {
  task_id: string;
  tree: string;
}

export interface DepOverviewResult {
  high_impact: OverviewImpactItem[];
  blocked: OverviewBlockedItem[];
  trees: OverviewTree[];
}

function clip(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

export function runDepOverview(options: { services: Services; json: boolean }): DepOverviewResult {
  const { services, json } = options;
  const deps = services.dependencyService;
  const snapshot = deps.snapshot();

  const highImpact: OverviewImpactItem[] = [];
  for (const entry of deps.highImpactBlockers(1, snapshot)) {
    const task = snapshot.tasks.get(entry.taskId);
    if (!task) continue;
    highImpact.push({ task_id: entry.taskId, title: task.title, dependent_count: entry.dependentCount });
  }

  const blocked: OverviewBlockedItem[] = [];
  for (const info of deps.allDependencyInfo(snapshot).values()) {
    const task = snapshot.tasks.get(info.taskId);
    if (!task || !info.isBlocked) continue;
    blocked.push({ task_id: info.taskId, title: task.title, blockers: info.blockers });
  }

  const trees: OverviewTree[] = highImpact
    .slice(0, TREE_COUNT)
    .map((item) => ({ task_id: item.task_id, tree: deps.dependencyTree(item.task_id) }));

  const result: DepOverviewResult = { high_impact: highImpact, blocked, trees };

  if (json) {
    console.log(JSON.stringify(result));
    return result;
  }

  if (highImpact.length === 0 && blocked.length === 0) {
    console.log('No open task waits on another');
    return result;
  }

  if (highImpact.length > 0) {
    console.log('High impact:');
    for (const item of highImpact.slice(0, TEXT_SECTION_LIMIT)) {
      console.log(`  [${item.task_id}] ${clip(item.title, 35)} → unblocks ${item.dependent_count}`);
    }
  }

  if (blocked.length > 0) {
    console.log('Blocked:');
    for (const item of blocked.slice(0, TEXT_SECTION_LIMIT)) {
      const shown = item.blockers.slice(0, TEXT_BLOCKER_LIMIT).join(', ');
      const extra = item.blockers.length - TEXT_BLOCKER_LIMIT;
      console.log(`  [${item.task_id}] ${clip(item.title, 35)} ← ${shown}${extra > 0 ? ` +${extra}` : ''}`);
    }
  }

  for (const entry of trees) {
    console.log('');
    console.log(entry.tree);
  }

  return result;
}

export function createDepOverviewCommand(): Command {
  return new Command('overview')
    .description('Summarise the whole blocker graph')
    .action(function (this: Command) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        runDepOverview({ services, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
