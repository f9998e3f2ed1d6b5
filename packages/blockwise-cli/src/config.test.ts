import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  expandTilde,
  getConfigPath,
  getDefaultDbPath,
  readConfig,
  resolveDbPath,
  resolveDbPathWithSource,
} from './config.js';

describe('config', () => {
  let tempDir: string;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockwise-config-test-'));
    delete process.env.BLOCKWISE_DB;
    delete process.env.BLOCKWISE_CONFIG;
    process.env.XDG_DATA_HOME = path.join(tempDir, 'data');
    process.env.XDG_CONFIG_HOME = path.join(tempDir, 'config');
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('paths', () => {
    it('puts the default database under XDG_DATA_HOME', () => {
      expect(getDefaultDbPath()).toBe(path.join(tempDir, 'data', 'blockwise', 'data.db'));
    });

    it('puts the config file under XDG_CONFIG_HOME', () => {
      expect(getConfigPath()).toBe(path.join(tempDir, 'config', 'blockwise', 'config.json'));
    });

    it('lets BLOCKWISE_CONFIG override the config path', () => {
      process.env.BLOCKWISE_CONFIG = '/tmp/elsewhere.json';
      expect(getConfigPath()).toBe('/tmp/elsewhere.json');
    });

    it('expands a leading tilde', () => {
      expect(expandTilde('~/tasks.db')).toBe(path.join(os.homedir(), 'tasks.db'));
      expect(expandTilde('/abs/tasks.db')).toBe('/abs/tasks.db');
    });
  });

  describe('readConfig', () => {
    it('returns an empty config when the file is missing', () => {
      expect(readConfig(path.join(tempDir, 'missing.json'))).toEqual({});
    });

    it('reads dbPath and logLevel', () => {
      const configPath = path.join(tempDir, 'config.json');
      fs.writeFileSync(configPath, JSON.stringify({ dbPath: '/tmp/x.db', logLevel: 'debug' }));
      expect(readConfig(configPath)).toEqual({ dbPath: '/tmp/x.db', logLevel: 'debug' });
    });

    it('rejects malformed JSON', () => {
      const configPath = path.join(tempDir, 'config.json');
      fs.writeFileSync(configPath, '{ nope');
      expect(() => readConfig(configPath)).toThrow(`Config file at ${configPath} is not valid JSON`);
    });

    it('rejects an unknown log level', () => {
      const configPath = path.join(tempDir, 'config.json');
      fs.writeFileSync(configPath, JSON.stringify({ logLevel: 'loud' }));
      expect(() => readConfig(configPath)).toThrow(/is invalid: logLevel/);
    });
  });

  describe('resolveDbPathWithSource', () => {
    it('prefers the --db flag', () => {
      process.env.BLOCKWISE_DB = '/tmp/env.db';
      expect(resolveDbPathWithSource('/tmp/cli.db', { dbPath: '/tmp/config.db' })).toEqual({
        path: '/tmp/cli.db',
        source: 'cli',
      });
    });

    it('falls back to BLOCKWISE_DB, then config, then the default', () => {
      process.env.BLOCKWISE_DB = '/tmp/env.db';
      expect(resolveDbPathWithSource(undefined, { dbPath: '/tmp/config.db' }).source).toBe('env');

      delete process.env.BLOCKWISE_DB;
      expect(resolveDbPathWithSource(undefined, { dbPath: '/tmp/config.db' })).toEqual({
        path: '/tmp/config.db',
        source: 'config',
      });

      expect(resolveDbPath()).toBe(getDefaultDbPath());
    });
  });
});
