import type Database from 'better-sqlite3';

const SLEEP_BUFFER = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
const SLEEP_VIEW = new Int32Array(SLEEP_BUFFER);

function blockingSleep(ms: number): void {
  if (ms <= 0) {
    return;
  }
  const deadline = Date.now() + ms;
  while (true) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return;
    }
    Atomics.wait(SLEEP_VIEW, 0, 0, remaining);
  }
}

function isBusyError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  const code = 'code' in err ? err.code : undefined;
  const message = 'message' in err ? err.message : undefined;
  return (
    code === 'SQLITE_BUSY' ||
    (typeof message === 'string' && message.includes('SQLITE_BUSY'))
  );
}

export interface WriteTransactionOptions {
  retries?: number;
  busySleepMs?: number;
}

/**
 * Execute a function within a write transaction using BEGIN IMMEDIATE.
 * Concurrent CLI processes serialize on the write lock; SQLITE_BUSY is
 * retried with a linearly growing sleep.
 *
 * Nested calls run inside the outer transaction.
 */
export function withWriteTransaction<T>(
  db: Database.Database,
  fn: () => T,
  opts?: WriteTransactionOptions
): T {
  if (db.inTransaction) {
    return fn();
  }

  const retries = opts?.retries ?? 5;
  const busySleepMs = opts?.busySleepMs ?? 25;
  let attempt = 0;

  while (true) {
    try {
      return db.transaction(fn).immediate();
    } catch (err: unknown) {
      if (!isBusyError(err) || attempt >= retries) {
        throw err;
      }
      attempt += 1;
      blockingSleep(busySleepMs * attempt);
    }
  }
}
