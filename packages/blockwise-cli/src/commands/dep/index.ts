import { Command } from 'commander';
import { createDepAddCommand } from './add.js';
import { createDepRemoveCommand } from './remove.js';
import { createDepShowCommand } from './show.js';
import { createDepTreeCommand } from './tree.js';
import { createDepImpactCommand } from './impact.js';
import { createDepPruneCommand } from './prune.js';
import { createDepOverviewCommand } from './overview.js';

export function createDepCommand(): Command {
  return new Command('dep')
    .description('Blocker graph commands')
    .addCommand(createDepAddCommand())
    .addCommand(createDepRemoveCommand())
    .addCommand(createDepShowCommand())
    .addCommand(createDepTreeCommand())
    .addCommand(createDepImpactCommand())
    .addCommand(createDepOverviewCommand())
    .addCommand(createDepPruneCommand());
}
