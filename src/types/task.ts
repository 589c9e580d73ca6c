/**
 * Task record type definitions.
 *
 * Status and priority values are defined once here as const tuples; the
 * union types and the zod schemas in store/validation-schemas.ts derive
 * from them.
 */

export const TASK_STATUSES = ['PENDING', 'IN_PROGRESS', 'DONE', 'CANCELLED'] as const;

export const TASK_PRIORITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;

export const AUDIT_OPERATIONS = ['CREATE', 'UPDATE', 'DELETE'] as const;

/** Fields a caller may change through an update. */
export const UPDATABLE_FIELDS = ['title', 'description', 'assignee', 'status', 'priority'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];
export type TaskPriority = typeof TASK_PRIORITIES[number];
export type AuditOperation = typeof AUDIT_OPERATIONS[number];
export type UpdatableField = typeof UPDATABLE_FIELDS[number];

/** Task record as persisted in the collection document. */
export interface TaskDocument {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  assignee: string;
  version: number;
  created_at: string;
  updated_at: string;
}

/** The persisted unit: every record plus a checksum over the rest. */
export interface CollectionDocument {
  records: TaskDocument[];
  checksum: string;
}

/** Proposed values for an update, keyed by field. */
export type TaskChanges = Partial<Pick<TaskDocument, UpdatableField>>;

/** Unvalidated update input as it arrives from a front end. */
export type TaskChangesInput = Partial<Record<UpdatableField, string>>;

/** Before/after pair for one changed field. */
export interface FieldChange<T> {
  previous: T;
  new: T;
}

export type FieldChanges = {
  [K in UpdatableField]?: FieldChange<TaskDocument[K]>;
};

/**
 * Result of an update. `changes` is empty for a no-op; `version` and
 * `updated_at` are the record's values after the update.
 */
export interface ChangeSet {
  changes: FieldChanges;
  version: number;
  updated_at: string;
}

/** Filters for listing records. Every supplied filter must match. */
export interface TaskFilters {
  status?: TaskStatus;
  priority?: TaskPriority;
  assignee?: string;
}
