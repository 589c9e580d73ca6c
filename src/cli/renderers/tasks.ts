/**
 * Human-readable renderers for task-ledger CLI commands.
 *
 * Each renderer takes the same result that the JSON envelope would carry
 * and returns a string suitable for terminal display.
 */

import type { AuditEntry, RestoreResult, VerifyResult } from '../../store/index.js';
import type { TaskDocument } from '../../types/task.js';
import {
  BOLD, DIM, NC, GREEN, YELLOW,
  BOX, hRule,
  statusSymbol, statusColor, priorityColor, operationColor, shortTimestamp,
} from './colors.js';

/** Result of create/view. */
export interface TaskResult {
  task: TaskDocument;
}

/** Result of update; `changed` is false for a no-op. */
export interface UpdateResult {
  task: TaskDocument;
  changed: boolean;
}

export interface ListResult {
  tasks: TaskDocument[];
  total: number;
}

export interface DeleteResult {
  id: string;
  deleted: true;
}

export interface HistoryResult {
  id: string;
  entries: AuditEntry[];
}

export interface AuditResult {
  entries: AuditEntry[];
  total: number;
}

export interface AuditClearResult {
  cleared: true;
  path: string;
}

export interface VersionResult {
  version: string;
}

// ---------------------------------------------------------------------------
// view / create / update: single task
// ---------------------------------------------------------------------------

function taskLine(task: TaskDocument): string {
  return `${task.id} ${statusSymbol(task.status)} ${task.title} [${task.priority}]`;
}

/** Render a single task in a box. */
export function renderShow(data: TaskResult, quiet: boolean): string {
  const { task } = data;
  if (quiet) return taskLine(task);

  const lines: string[] = [];
  const hr = hRule();
  const sCol = statusColor(task.status);
  const pCol = priorityColor(task.priority);

  lines.push('');
  lines.push(`${BOX.tl}${hr}${BOX.tr}`);
  lines.push(`${BOX.v}  ${BOLD}${task.id}${NC} ${statusSymbol(task.status)} ${pCol}[${task.priority}]${NC}`);
  lines.push(`${BOX.v}  ${task.title}`);
  lines.push(`${BOX.ml}${hr}${BOX.mr}`);
  lines.push(`${BOX.v}  ${DIM}Status:${NC}      ${sCol}${task.status}${NC}`);
  lines.push(`${BOX.v}  ${DIM}Priority:${NC}    ${task.priority}`);
  lines.push(`${BOX.v}  ${DIM}Assignee:${NC}    ${task.assignee}`);
  lines.push(`${BOX.v}  ${DIM}Version:${NC}     ${task.version}`);
  lines.push(`${BOX.v}  ${DIM}Created:${NC}     ${shortTimestamp(task.created_at)}`);
  lines.push(`${BOX.v}  ${DIM}Updated:${NC}     ${shortTimestamp(task.updated_at)}`);

  if (task.description) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Description${NC}`);
    for (const line of task.description.split('\n')) {
      lines.push(`${BOX.v}    ${line}`);
    }
  }

  lines.push(`${BOX.bl}${hr}${BOX.br}`);
  lines.push('');
  return lines.join('\n');
}

export function renderCreate(data: TaskResult, quiet: boolean): string {
  if (quiet) return data.task.id;
  return `${GREEN}Created${NC} ${taskLine(data.task)}`;
}

export function renderUpdate(data: UpdateResult, quiet: boolean): string {
  if (quiet) return data.task.id;
  if (!data.changed) {
    return `${DIM}No changes${NC} ${data.task.id} (version ${data.task.version})`;
  }
  return `${YELLOW}Updated${NC} ${taskLine(data.task)} (version ${data.task.version})`;
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export function renderList(data: ListResult, quiet: boolean): string {
  const { tasks, total } = data;
  if (tasks.length === 0) {
    return quiet ? '' : 'No tasks found.';
  }
  if (quiet) {
    return tasks.map((t) => t.id).join('\n');
  }

  const lines: string[] = [];
  lines.push('');
  lines.push(`${BOLD}TASKS${NC} ${DIM}(${total})${NC}`);
  lines.push(hRule());
  for (const t of tasks) {
    const sCol = statusColor(t.status);
    const pCol = priorityColor(t.priority);
    lines.push(
      `  ${sCol}${statusSymbol(t.status)}${NC} ${BOLD}${t.id}${NC} ${t.title} `
      + `${pCol}[${t.priority}]${NC} ${DIM}@${t.assignee} v${t.version}${NC}`,
    );
  }
  lines.push('');
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

export function renderDelete(data: DeleteResult, quiet: boolean): string {
  if (quiet) return data.id;
  return `Deleted ${data.id}`;
}

// ---------------------------------------------------------------------------
// history / audit
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** One line per changed field of an UPDATE entry. */
function changeLines(entry: AuditEntry): string[] {
  const changes = entry.details['changes'];
  if (!isPlainObject(changes)) return [];
  const lines: string[] = [];
  for (const [field, change] of Object.entries(changes)) {
    if (!isPlainObject(change)) continue;
    lines.push(`      ${field}: ${formatValue(change['previous'])} -> ${formatValue(change['new'])}`);
  }
  return lines;
}

function renderEntries(entries: AuditEntry[], showRecord: boolean): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    const opCol = operationColor(entry.operation);
    const record = showRecord ? ` ${entry.record_id}` : '';
    lines.push(
      `  ${DIM}${shortTimestamp(entry.timestamp)}${NC} ${opCol}${entry.operation.padEnd(6)}${NC}${record} ${DIM}by ${entry.actor}${NC}`,
    );
    if (entry.operation === 'UPDATE') {
      lines.push(...changeLines(entry));
    }
  }
  return lines;
}

export function renderHistory(data: HistoryResult, quiet: boolean): string {
  if (data.entries.length === 0) {
    return quiet ? '' : `No history for ${data.id}.`;
  }
  if (quiet) {
    return data.entries.map((e) => `${e.timestamp} ${e.operation}`).join('\n');
  }
  return [
    '',
    `${BOLD}HISTORY${NC} ${data.id} ${DIM}(${data.entries.length})${NC}`,
    hRule(),
    ...renderEntries(data.entries, false),
    '',
  ].join('\n');
}

export function renderAudit(data: AuditResult, quiet: boolean): string {
  if (data.entries.length === 0) {
    return quiet ? '' : 'Audit log is empty.';
  }
  if (quiet) {
    return data.entries.map((e) => `${e.timestamp} ${e.operation} ${e.record_id}`).join('\n');
  }
  return [
    '',
    `${BOLD}AUDIT LOG${NC} ${DIM}(${data.total})${NC}`,
    hRule(),
    ...renderEntries(data.entries, true),
    '',
  ].join('\n');
}

export function renderAuditClear(data: AuditClearResult, quiet: boolean): string {
  return quiet ? '' : `Audit log cleared: ${data.path}`;
}

// ---------------------------------------------------------------------------
// verify / restore / version
// ---------------------------------------------------------------------------

export function renderVerify(data: VerifyResult, quiet: boolean): string {
  if (quiet) return data.checksum;
  return `${GREEN}OK${NC} ${data.records} record(s), checksum ${DIM}${data.checksum}${NC}`;
}

export function renderRestore(data: RestoreResult, quiet: boolean): string {
  if (quiet) return data.backup;
  return `Restored ${data.records} record(s) from ${data.backup}`;
}

export function renderVersion(data: VersionResult, _quiet: boolean): string {
  return data.version;
}
