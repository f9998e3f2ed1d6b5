import pino from 'pino';

export type Logger = pino.Logger;

/** Default for services constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
