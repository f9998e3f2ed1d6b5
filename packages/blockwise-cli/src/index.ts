import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { createTaskCommand } from './commands/task/index.js';
import { createDepCommand } from './commands/dep/index.js';
import { createValidateCommand } from './commands/validate.js';
import { createWhichDbCommand } from './commands/which-db.js';
import { CLIError, ExitCode } from './errors.js';
import { readConfig, resolveDbPath } from './config.js';
import { createErrorEnvelope } from './output.js';

interface UsageErrorDetails {
  received: string;
  reason: string;
  did_you_mean?: string[];
  examples: string[];
}

const PackageJsonSchema = z.object({ version: z.string() });

/** Version of the nearest package.json above this module, source or build output alike. */
function readVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(candidate, 'utf-8')));
      if (parsed.success) return parsed.data.version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('blockwise')
    .description('Track which tasks wait on which, and release them when their blockers finish.')
    .version(readVersion())
    .option('--db <path>', 'Path to database file')
    .option('--format <format>', 'Output format: json or md', 'json')
    .option('--author <name>', 'Author recorded on the events this command appends')
    .option('--agent <id>', 'Agent id recorded on the events this command appends');
  program.addHelpText(
    'after',
    `
Examples:
  blockwise task add "Design schema"
  blockwise dep add API_TASK_ID SCHEMA_TASK_ID
  blockwise --format md dep tree SCHEMA_TASK_ID
`
  );

  program.addCommand(createTaskCommand());
  program.addCommand(createDepCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createWhichDbCommand());

  return program;
}

export function parseRequestedFormat(args: string[]): 'json' | 'md' {
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === '--format' && args[i + 1] === 'md') return 'md';
    if (token === '--format=md') return 'md';
  }
  return 'json';
}

function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const prev = new Array<number>(b.length + 1);
  const curr = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j += 1) prev[j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    for (let j = 0; j <= b.length; j += 1) prev[j] = curr[j];
  }

  return prev[b.length];
}

export function pickUniqueBestMatch(token: string, candidates: string[], maxDistance = 2): string | null {
  const prefixMatches = candidates.filter((candidate) => candidate.startsWith(token));
  if (prefixMatches.length === 1) return prefixMatches[0];
  if (prefixMatches.length > 1) return null;

  const scored = candidates
    .map((candidate) => ({ candidate, distance: editDistance(token, candidate) }))
    .filter((entry) => entry.distance <= maxDistance)
    .sort((left, right) => left.distance - right.distance);

  if (scored.length === 0) return null;
  if (scored.length > 1 && scored[0].distance === scored[1].distance) return null;
  return scored[0].candidate;
}

/** The deepest command named by the leading positional tokens. */
function resolveCommandPath(args: string[], program: Command): { command: Command; tokens: string[] } {
  let command = program;
  const tokens: string[] = [];
  for (const arg of args) {
    if (arg.startsWith('-')) continue;
    const child = command.commands.find((candidate) => candidate.name() === arg);
    if (!child) break;
    command = child;
    tokens.push(arg);
  }
  return { command, tokens };
}

export function buildUsageError(args: string[], program: Command, rawMessage: string): CLIError {
  const message = rawMessage.replace(/^error:\s*/i, '').trim();
  const received = `blockwise ${args.join(' ')}`.trim();
  const { command, tokens } = resolveCommandPath(args, program);
  const prefix = tokens.length > 0 ? `${tokens.join(' ')} ` : '';

  const unknownCommand = message.match(/unknown command '([^']+)'/i);
  if (unknownCommand) {
    const unknown = unknownCommand[1];
    const best = pickUniqueBestMatch(unknown, command.commands.map((child) => child.name()));
    const details: UsageErrorDetails = {
      received,
      reason: `Unknown command '${unknown}'.`,
      did_you_mean: best ? [best] : undefined,
      examples: [best ? `blockwise ${prefix}${best} --help` : `blockwise ${prefix}--help`],
    };
    return new CLIError(`Unknown command '${unknown}'.`, ExitCode.InvalidUsage, 'invalid_usage', details);
  }

  const unknownOption = message.match(/unknown option '([^']+)'/i);
  if (unknownOption) {
    const unknown = unknownOption[1];
    const flags = [command, program]
      .flatMap((scope) => scope.options.map((option) => option.long))
      .filter((flag): flag is string => flag !== undefined);
    const best = pickUniqueBestMatch(unknown, flags);
    const details: UsageErrorDetails = {
      received,
      reason: `Unknown option '${unknown}'.`,
      did_you_mean: best ? [best] : undefined,
      examples: [`blockwise ${prefix}--help`],
    };
    return new CLIError(`Unknown option '${unknown}'.`, ExitCode.InvalidUsage, 'invalid_usage', details);
  }

  const missingArgument = message.match(/missing required argument '([^']+)'/i);
  if (missingArgument) {
    const details: UsageErrorDetails = {
      received,
      reason: `Required argument '${missingArgument[1]}' is missing.`,
      examples: [`blockwise ${prefix}--help`],
    };
    return new CLIError(
      `Missing required argument '${missingArgument[1]}'.`,
      ExitCode.InvalidUsage,
      'invalid_usage',
      details
    );
  }

  return new CLIError(message || 'Invalid command usage.', ExitCode.InvalidUsage, 'invalid_usage', {
    received,
    reason: message,
    examples: ['blockwise --help'],
  });
}

function renderUsageError(error: CLIError, requestedFormat: 'json' | 'md'): void {
  if (requestedFormat === 'json') {
    console.log(JSON.stringify(createErrorEnvelope(error.code, error.message, error.details)));
  } else {
    console.error(`Error: ${error.message}`);
    const details = error.details;
    if (details && typeof details === 'object' && 'did_you_mean' in details && Array.isArray(details.did_you_mean)) {
      console.error(`Did you mean: ${details.did_you_mean.join(', ')}`);
    }
  }
  process.exit(error.exitCode);
}

function applyCommanderOverrides(command: Command): void {
  command.exitOverride();
  command.configureOutput({
    writeErr: () => {},
  });

  for (const child of command.commands) {
    applyCommanderOverrides(child);
  }
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  applyCommanderOverrides(program);

  const args = argv.slice(2);
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === ExitCode.Success) return;
      renderUsageError(buildUsageError(args, program, error.message), parseRequestedFormat(args));
      return;
    }
    throw error;
  }
}

export { CLIError, ExitCode, readConfig, resolveDbPath, createErrorEnvelope };
