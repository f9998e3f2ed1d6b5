export const SCHEMA_VERSION = 'v1';

export interface ErrorEnvelope {
  schema_version: typeof SCHEMA_VERSION;
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    suggestions?: string[];
  };
}

export function createErrorEnvelope(code: string, message: string, details?: unknown, suggestions?: string[]): ErrorEnvelope {
  return {
    schema_version: SCHEMA_VERSION,
    ok: false,
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      ...(suggestions && suggestions.length > 0 ? { suggestions } : {}),
    },
  };
}

export function escapeMd(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
