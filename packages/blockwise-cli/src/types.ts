import { z } from 'zod';

export const OutputFormatSchema = z.enum(['json', 'md']);

export const GlobalOptionsSchema = z
  .object({
    db: z.string().optional(),
    format: OutputFormatSchema.default('json'),
    author: z.string().min(1).optional(),
    agent: z.string().min(1).optional(),
  })
  .transform((value) => ({
    db: value.db,
    format: value.format,
    json: value.format === 'json',
    author: value.author,
    agent: value.agent,
  }));

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Config {
  dbPath?: string;
  logLevel?: LogLevel;
}
