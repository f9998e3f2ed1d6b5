import type { Services } from './db.js';
import { CLIError, ExitCode } from './errors.js';

/**
 * Resolve a task id or unique prefix to a full id. An ambiguous prefix
 * propagates as AmbiguousPrefixError and is mapped by handleError.
 */
export function resolveId(services: Services, idOrPrefix: string): string {
  const resolved = services.taskService.resolveTaskId(idOrPrefix);
  if (resolved === null) {
    throw new CLIError(`Task not found: ${idOrPrefix}`, ExitCode.NotFound, undefined, { task_id: idOrPrefix }, [
      'blockwise task list',
    ]);
  }
  return resolved;
}
