import { monotonicFactory } from 'ulid';

// Monotonic so ids minted within the same millisecond still sort by creation.
const nextUlid = monotonicFactory();

export function generateId(): string {
  return nextUlid();
}

const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export function isValidId(id: string): boolean {
  if (!id || typeof id !== 'string') return false;
  return ULID_REGEX.test(id);
}
