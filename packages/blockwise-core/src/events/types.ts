import { z } from 'zod';

export enum EventType {
  TaskCreated = 'task_created',
  StatusChanged = 'status_changed',
  BlockerAdded = 'blocker_added',
  BlockerRemoved = 'blocker_removed',
  TaskUpdated = 'task_updated',
}

export enum TaskStatus {
  Active = 'active',
  Paused = 'paused',
  Blocked = 'blocked',
  Completed = 'completed',
  Cancelled = 'cancelled',
}

export enum TaskPriority {
  Critical = 'critical',
  High = 'high',
  Normal = 'normal',
  Low = 'low',
  Background = 'background',
}

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.Completed,
  TaskStatus.Cancelled,
]);

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface EventEnvelope {
  event_id: string;
  task_id: string;
  type: EventType;
  data: Record<string, unknown>;
  author?: string;
  agent_id?: string;
  timestamp: string;
}

// =============================================================================
// Field Size Limits
// =============================================================================
export const FIELD_LIMITS = {
  TITLE: 128,
  DESCRIPTION: 16384,
  TAG: 64,
  PROJECT_NAME: 255,
  IDENTIFIER: 255,
  ARRAY_MAX_ITEMS: 100,
} as const;

// =============================================================================
// Base Validators
// =============================================================================

const nonEmptyString = z.string().min(1).max(FIELD_LIMITS.IDENTIFIER);

// Project name validation: alphanumeric start, followed by alphanumeric/hyphens/underscores
const projectName = z
  .string()
  .min(1, 'Project name cannot be empty')
  .max(FIELD_LIMITS.PROJECT_NAME, `Project name cannot exceed ${FIELD_LIMITS.PROJECT_NAME} characters`)
  .regex(
    /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/,
    'Project name must start with alphanumeric and contain only alphanumeric, hyphens, and underscores'
  );

const titleString = z.string().min(1).max(FIELD_LIMITS.TITLE);
const descriptionString = z.string().max(FIELD_LIMITS.DESCRIPTION);
const tagString = z.string().min(1).max(FIELD_LIMITS.TAG);

const tagsArray = z.array(tagString).max(FIELD_LIMITS.ARRAY_MAX_ITEMS);
const blockersArray = z
  .array(nonEmptyString)
  .max(FIELD_LIMITS.ARRAY_MAX_ITEMS)
  .refine((ids) => new Set(ids).size === ids.length, { message: 'Blocker ids must be unique' });

// =============================================================================
// Event Data Schemas
// =============================================================================

const TaskCreatedSchema = z.object({
  title: titleString,
  description: descriptionString.optional(),
  project: projectName.optional(),
  priority: z.nativeEnum(TaskPriority).optional(),
  tags: tagsArray.optional(),
  blockers: blockersArray.optional(),
  status: z.nativeEnum(TaskStatus).optional(),
});

const StatusChangedSchema = z.object({
  from: z.nativeEnum(TaskStatus),
  to: z.nativeEnum(TaskStatus),
});

const BlockerSchema = z.object({
  blocker_id: nonEmptyString,
});

// Explicit list of updatable fields - MUST match tasks_current table columns
export const UPDATABLE_TASK_FIELDS = ['title', 'description', 'project', 'priority', 'tags'] as const;

export type UpdatableTaskField = (typeof UPDATABLE_TASK_FIELDS)[number];

const updatableFieldValidators: Record<UpdatableTaskField, z.ZodSchema<unknown>> = {
  title: titleString,
  description: descriptionString.nullable(),
  project: projectName.nullable(),
  priority: z.nativeEnum(TaskPriority),
  tags: tagsArray,
};

const TaskUpdatedSchema = z
  .object({
    field: z.enum(UPDATABLE_TASK_FIELDS),
    old_value: z.unknown().optional(),
    new_value: z.unknown(),
  })
  .superRefine((data, ctx) => {
    const validator = updatableFieldValidators[data.field];
    const result = validator.safeParse(data.new_value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({
          ...issue,
          path: ['new_value', ...issue.path],
        });
      }
    }
  });

// =============================================================================
// Schema Registry and Validation
// =============================================================================

export const EventSchemas: Record<EventType, z.ZodSchema<unknown>> = {
  [EventType.TaskCreated]: TaskCreatedSchema,
  [EventType.StatusChanged]: StatusChangedSchema,
  [EventType.BlockerAdded]: BlockerSchema,
  [EventType.BlockerRemoved]: BlockerSchema,
  [EventType.TaskUpdated]: TaskUpdatedSchema,
};

export function validateEventData(type: EventType, data: unknown): void {
  const schema = EventSchemas[type];
  if (!schema) {
    throw new Error(`No schema for event type: ${type}`);
  }
  schema.parse(data);
}

// =============================================================================
// Inferred Types
// =============================================================================

export type TaskCreatedData = z.infer<typeof TaskCreatedSchema>;
export type StatusChangedData = z.infer<typeof StatusChangedSchema>;
export type BlockerData = z.infer<typeof BlockerSchema>;
export type TaskUpdatedData = z.infer<typeof TaskUpdatedSchema>;
