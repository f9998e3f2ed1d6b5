import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { LogLevelSchema, type Config } from './types.js';

const ConfigFileSchema = z.object({
  dbPath: z.string().min(1).optional(),
  logLevel: LogLevelSchema.optional(),
});

export type DbPathSource = 'cli' | 'env' | 'config' | 'default';

export interface ResolvedDbPath {
  path: string;
  source: DbPathSource;
}

function getXdgDataHome(): string {
  if (process.env.XDG_DATA_HOME) return process.env.XDG_DATA_HOME;
  if (process.platform === 'win32') {
    return process.env.LOCALAPPDATA ?? path.join(os.homedir(), 'AppData', 'Local');
  }
  return path.join(os.homedir(), '.local', 'share');
}

function getXdgConfigHome(): string {
  if (process.env.XDG_CONFIG_HOME) return process.env.XDG_CONFIG_HOME;
  if (process.platform === 'win32') {
    return process.env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming');
  }
  return path.join(os.homedir(), '.config');
}

export function getDefaultDbPath(): string {
  return path.join(getXdgDataHome(), 'blockwise', 'data.db');
}

export function getConfigPath(): string {
  return process.env.BLOCKWISE_CONFIG || path.join(getXdgConfigHome(), 'blockwise', 'config.json');
}

export function expandTilde(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

/** Read the config file. A missing file is an empty config; a malformed one is an error. */
export function readConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) return {};

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Config file at ${configPath} is not valid JSON`);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Config file at ${configPath} is invalid: ${issues.join('; ')}`);
  }
  return result.data;
}

export function resolveDbPathWithSource(cliOption?: string, config: Config = {}): ResolvedDbPath {
  if (cliOption) return { path: expandTilde(cliOption), source: 'cli' };
  if (process.env.BLOCKWISE_DB) return { path: expandTilde(process.env.BLOCKWISE_DB), source: 'env' };
  if (config.dbPath) return { path: expandTilde(config.dbPath), source: 'config' };
  return { path: getDefaultDbPath(), source: 'default' };
}

export function resolveDbPath(cliOption?: string, config: Config = {}): string {
  return resolveDbPathWithSource(cliOption, config).path;
}
