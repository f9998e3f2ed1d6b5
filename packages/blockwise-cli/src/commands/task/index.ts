import { Command } from 'commander';
import { createAddCommand } from './add.js';
import { createListCommand } from './list.js';
import { createShowCommand } from './show.js';
import { createPauseCommand, createResumeCommand } from './status.js';
import { createCancelCommand, createCompleteCommand } from './finish.js';
import { createHistoryCommand } from './history.js';

export function createTaskCommand(): Command {
  const command = new Command('task').description('Task management commands');

  command.addCommand(createAddCommand());
  command.addCommand(createListCommand());
  command.addCommand(createShowCommand());
  command.addCommand(createPauseCommand());
  command.addCommand(createResumeCommand());
  command.addCommand(createCompleteCommand());
  command.addCommand(createCancelCommand());
  command.addCommand(createHistoryCommand());

  return command;
}
