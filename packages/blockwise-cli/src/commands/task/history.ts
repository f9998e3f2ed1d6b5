import { Command } from 'commander';
import { closeDb, initializeDbFromOptions, type Services } from '../../db.js';
import { handleError } from '../../errors.js';
import { resolveId } from '../../resolve-id.js';
import { GlobalOptionsSchema } from '../../types.js';

export interface HistoryEntry {
  event_id: string;
  type: string;
  data: Record<string, unknown>;
  author: string | null;
  agent_id: string | null;
  timestamp: string;
}

export interface HistoryResult {
  task_id: string;
  events: HistoryEntry[];
}

export function runHistory(options: { services: Services; taskId: string; json: boolean }): HistoryResult {
  const { services, taskId, json } = options;

  const result: HistoryResult = {
    task_id: taskId,
    events: services.taskService.history(taskId).map((event) => ({
      event_id: event.event_id,
      type: event.type,
      data: event.data,
      author: event.author ?? null,
      agent_id: event.agent_id ?? null,
      timestamp: event.timestamp,
    })),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`History for ${taskId}:`);
    for (const event of result.events) {
      console.log(`  ${event.timestamp} ${event.type} ${JSON.stringify(event.data)}`);
    }
  }

  return result;
}

export function createHistoryCommand(): Command {
  return new Command('history')
    .description("Show a task's events")
    .argument('<taskId>', 'Task ID or unique prefix')
    .action(function (this: Command, rawTaskId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      const services = initializeDbFromOptions(globalOpts);
      try {
        const taskId = resolveId(services, rawTaskId);
        runHistory({ services, taskId, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      } finally {
        closeDb(services);
      }
    });
}
