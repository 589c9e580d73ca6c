/**
 * Task record entity: validated fields, a version counter, and update
 * semantics that produce a per-field change-set for the audit trail.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';
import { systemClock, nextTimestamp, type Clock } from '../clock.js';
import {
  TASK_STATUSES,
  TASK_PRIORITIES,
  UPDATABLE_FIELDS,
  type ChangeSet,
  type FieldChange,
  type FieldChanges,
  type TaskChanges,
  type TaskChangesInput,
  type TaskDocument,
  type TaskPriority,
  type TaskStatus,
  type UpdatableField,
} from '../../types/task.js';
import {
  TaskDocumentSchema,
  TaskPrioritySchema,
  TaskStatusSchema,
} from '../../store/validation-schemas.js';

/** Validate a status value. */
export function parseStatus(value: string): TaskStatus {
  const result = TaskStatusSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid status: ${value}. Use: ${TASK_STATUSES.join(', ')}`);
  }
  return result.data;
}

/** Validate a priority value. */
export function parsePriority(value: string): TaskPriority {
  const result = TaskPrioritySchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid priority: ${value}. Use: ${TASK_PRIORITIES.join(', ')}`);
  }
  return result.data;
}

/**
 * Keep only the updatable fields of a loosely typed mapping.
 * Unknown keys are dropped; a known key with a non-string value is rejected.
 */
export function pickTaskChanges(raw: Record<string, unknown>): TaskChangesInput {
  const picked: TaskChangesInput = {};
  for (const field of UPDATABLE_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new ValidationError(`Field ${field} must be a string`);
    }
    picked[field] = value;
  }
  return picked;
}

/** Validate every proposed value. Throws before anything is applied. */
function validateChanges(input: TaskChangesInput): TaskChanges {
  return {
    ...(input.title !== undefined && { title: input.title }),
    ...(input.description !== undefined && { description: input.description }),
    ...(input.assignee !== undefined && { assignee: input.assignee }),
    ...(input.status !== undefined && { status: parseStatus(input.status) }),
    ...(input.priority !== undefined && { priority: parsePriority(input.priority) }),
  };
}

interface FieldAccessor<V> {
  get(state: TaskDocument): V;
  set(state: TaskDocument, value: V): void;
}

/** Typed getter/setter per updatable field. */
const FIELD_ACCESSORS: { [K in UpdatableField]: FieldAccessor<TaskDocument[K]> } = {
  title: { get: (s) => s.title, set: (s, v) => { s.title = v; } },
  description: { get: (s) => s.description, set: (s, v) => { s.description = v; } },
  assignee: { get: (s) => s.assignee, set: (s, v) => { s.assignee = v; } },
  status: { get: (s) => s.status, set: (s, v) => { s.status = v; } },
  priority: { get: (s) => s.priority, set: (s, v) => { s.priority = v; } },
};

function diffField<K extends UpdatableField>(
  state: TaskDocument,
  field: K,
  next: TaskDocument[K] | undefined,
  changes: FieldChanges,
): void {
  if (next === undefined) return;
  const previous = FIELD_ACCESSORS[field].get(state);
  if (previous !== next) {
    changes[field] = { previous, new: next };
  }
}

function applyField<K extends UpdatableField>(
  state: TaskDocument,
  field: K,
  change: FieldChange<TaskDocument[K]> | undefined,
): void {
  if (change) FIELD_ACCESSORS[field].set(state, change.new);
}

/** Input for creating a record. Status and priority are validated. */
export interface CreateTaskInput {
  title: string;
  description: string;
  assignee: string;
  status?: string;
  priority?: string;
  id?: string;
}

/**
 * One task. Holds its persisted fields; `version` counts accepted
 * updates plus one.
 */
export class TaskRecord {
  private readonly state: TaskDocument;
  private readonly clock: Clock;

  private constructor(state: TaskDocument, clock: Clock) {
    this.state = state;
    this.clock = clock;
  }

  /**
   * Construct a new record at version 1 with `created_at === updated_at`.
   * Generates a UUID when no id is supplied.
   */
  static create(input: CreateTaskInput, clock: Clock = systemClock): TaskRecord {
    const status = parseStatus(input.status ?? 'PENDING');
    const priority = parsePriority(input.priority ?? 'MEDIUM');
    const now = clock.now().toISOString();
    return new TaskRecord(
      {
        id: input.id || randomUUID(),
        title: input.title,
        description: input.description,
        status,
        priority,
        assignee: input.assignee,
        version: 1,
        created_at: now,
        updated_at: now,
      },
      clock,
    );
  }

  /** Restore a record from its persisted form, validating every field. */
  static deserialize(document: unknown, clock: Clock = systemClock): TaskRecord {
    const result = TaskDocumentSchema.safeParse(document);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ValidationError(`Invalid task record: ${issues}`);
    }
    return new TaskRecord({ ...result.data }, clock);
  }

  get id(): string { return this.state.id; }
  get title(): string { return this.state.title; }
  get description(): string { return this.state.description; }
  get assignee(): string { return this.state.assignee; }
  get status(): TaskStatus { return this.state.status; }
  get priority(): TaskPriority { return this.state.priority; }
  get version(): number { return this.state.version; }
  get createdAt(): string { return this.state.created_at; }
  get updatedAt(): string { return this.state.updated_at; }

  /**
   * Apply proposed values. Only fields whose value differs are recorded.
   * An invalid status or priority rejects the whole update untouched.
   * A non-empty change-set bumps `version` by one and advances `updated_at`.
   */
  update(input: TaskChangesInput): ChangeSet {
    const proposed = validateChanges(input);

    const changes: FieldChanges = {};
    for (const field of UPDATABLE_FIELDS) {
      diffField(this.state, field, proposed[field], changes);
    }

    if (Object.keys(changes).length === 0) {
      return { changes, version: this.state.version, updated_at: this.state.updated_at };
    }

    for (const field of UPDATABLE_FIELDS) {
      applyField(this.state, field, changes[field]);
    }
    this.state.version += 1;
    this.state.updated_at = nextTimestamp(this.state.updated_at, this.clock.now());

    return { changes, version: this.state.version, updated_at: this.state.updated_at };
  }

  /** Plain copy in the persisted field layout. */
  serialize(): TaskDocument {
    return { ...this.state };
  }

  toString(): string {
    return `Task(id=${this.id.slice(0, 8)}, title='${this.title}', status=${this.status}, ` +
      `priority=${this.priority}, assignee='${this.assignee}', version=${this.version})`;
  }
}

/** True when an update changed at least one field. */
export function hasChanges(changeSet: ChangeSet): boolean {
  return Object.keys(changeSet.changes).length > 0;
}
