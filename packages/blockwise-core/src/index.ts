/**
 * blockwise core: a blocker graph engine over an event-sourced task ledger.
 *
 * @packageDocumentation
 */

// ============================================================================
// Database
// ============================================================================

export { createConnection, applySchema } from './db/connection.js';
export { withWriteTransaction, type WriteTransactionOptions } from './db/transaction.js';

// ============================================================================
// Events
// ============================================================================

export {
  EventStore,
  type AppendEventInput,
  type PersistedEventEnvelope,
  type GetByTaskIdOptions,
} from './events/store.js';

export {
  EventType,
  TaskStatus,
  TaskPriority,
  TERMINAL_STATUSES,
  FIELD_LIMITS,
  isTerminalStatus,
  validateEventData,
  EventSchemas,
  type EventEnvelope,
  type TaskCreatedData,
  type StatusChangedData,
  type BlockerData,
  type TaskUpdatedData,
} from './events/types.js';

// ============================================================================
// Projections
// ============================================================================

export { ProjectionEngine } from './projections/engine.js';
export { rebuildAllProjections } from './projections/rebuild.js';
export { TasksCurrentProjector } from './projections/tasks-current.js';
export { BlockersProjector } from './projections/blockers.js';
export { CachingProjector, type Projector, type ProjectionState } from './projections/types.js';

// ============================================================================
// Task stores
// ============================================================================

export {
  InMemoryTaskStore,
  makeTask,
  type Task,
  type TaskStore,
} from './store/task-store.js';

export {
  LedgerTaskStore,
  type CreateTaskInput,
  type EventContext,
  type ListTasksOptions,
} from './store/ledger-task-store.js';

// ============================================================================
// Services
// ============================================================================

export {
  DependencyService,
  UnblockDependentsError,
  type AddBlockerResult,
  type RemoveBlockerResult,
  type ClearBlockersResult,
  type DependencyInfo,
  type DependencySnapshot,
  type DependencyServiceOptions,
  type ImpactEntry,
  type PruneResult,
  type UnblockFailure,
  type UnblockResult,
} from './services/dependency-service.js';

export {
  TaskService,
  type FinishTaskResult,
  type NewTaskInput,
} from './services/task-service.js';

export {
  ValidationService,
  type StaleBlocker,
  type StatusDrift,
  type ValidationIssue,
  type ValidationResult,
} from './services/validation-service.js';

// ============================================================================
// Errors and utilities
// ============================================================================

export {
  AmbiguousPrefixError,
  InvalidStatusTransitionError,
  TaskBlockedError,
  TaskNotFoundError,
} from './errors.js';

export { generateId, isValidId } from './utils/id.js';
export { silentLogger, type Logger } from './utils/logger.js';
