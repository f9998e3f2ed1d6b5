import fs from 'fs';
import { Command } from 'commander';
import { readConfig, resolveDbPathWithSource, type DbPathSource } from '../config.js';
import { handleError } from '../errors.js';
import { GlobalOptionsSchema } from '../types.js';

export interface WhichDbResult {
  path: string;
  source: DbPathSource;
  exists: boolean;
}

export function runWhichDb(options: { cliPath?: string; configPath?: string; json: boolean }): WhichDbResult {
  const { cliPath, json } = options;

  const resolved = resolveDbPathWithSource(cliPath, readConfig(options.configPath));
  const result: WhichDbResult = {
    path: resolved.path,
    source: resolved.source,
    exists: fs.existsSync(resolved.path),
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`Database: ${result.path}`);
    console.log(`Source: ${result.source}`);
    console.log(`Exists: ${result.exists ? 'yes' : 'no'}`);
  }

  return result;
}

export function createWhichDbCommand(): Command {
  return new Command('which-db')
    .description('Show which database file commands would use')
    .action(function (this: Command) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        runWhichDb({ cliPath: globalOpts.db, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
