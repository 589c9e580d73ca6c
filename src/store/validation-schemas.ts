/**
 * Zod validation schemas for every on-disk shape task-ledger reads:
 * the collection document, audit log lines, and config files.
 *
 * Enum values come from the const tuples in types/task.ts so the schemas
 * and the TypeScript unions cannot drift apart.
 *
 * @module validation-schemas
 */

import { z } from 'zod';
import {
  TASK_STATUSES,
  TASK_PRIORITIES,
  AUDIT_OPERATIONS,
  type TaskDocument,
} from '../types/task.js';
import type { TaskLedgerConfig } from '../types/config.js';

// === ENUMS ===

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const TaskPrioritySchema = z.enum(TASK_PRIORITIES);
export const AuditOperationSchema = z.enum(AUDIT_OPERATIONS);

// === TASK RECORD ===

const timestamp = z.string().datetime({ offset: true });

export const TaskDocumentSchema: z.ZodType<TaskDocument> = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  status: TaskStatusSchema,
  priority: TaskPrioritySchema,
  assignee: z.string(),
  version: z.number().int().min(1),
  created_at: timestamp,
  updated_at: timestamp,
});

// === COLLECTION DOCUMENT ===

/** Shape check applied after the checksum has been verified. */
export const CollectionContentSchema = z.object({
  records: z.array(TaskDocumentSchema),
});

// === AUDIT LOG ===

export const AuditEntrySchema = z.object({
  timestamp,
  operation: AuditOperationSchema,
  record_id: z.string().min(1),
  actor: z.string(),
  details: z.record(z.string(), z.unknown()),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

// === CONFIG ===

export const TaskLedgerConfigSchema: z.ZodType<TaskLedgerConfig> = z.object({
  storage: z.object({
    dataFile: z.string().min(1),
    auditFile: z.string().min(1),
  }),
  defaultActor: z.string().min(1),
  backup: z.object({
    enabled: z.boolean(),
    maxBackups: z.number().int().min(1),
    dir: z.string().min(1),
  }),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});
