/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 */

import type { AuditOperation, TaskPriority, TaskStatus } from '../../types/task.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode box-drawing characters are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const BLUE = ansi('\x1b[0;34m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status, priority and operation styling
// ---------------------------------------------------------------------------

const STATUS_SYMBOLS_UNICODE: Record<TaskStatus, string> = {
  PENDING: '\u25CB',     // white circle
  IN_PROGRESS: '\u25C9', // fisheye
  DONE: '\u2713',        // check mark
  CANCELLED: '\u2717',   // ballot x
};

const STATUS_SYMBOLS_ASCII: Record<TaskStatus, string> = {
  PENDING: '-',
  IN_PROGRESS: '*',
  DONE: 'x',
  CANCELLED: 'c',
};

/** Map task status to a display symbol. */
export function statusSymbol(status: TaskStatus): string {
  return (unicodeEnabled ? STATUS_SYMBOLS_UNICODE : STATUS_SYMBOLS_ASCII)[status];
}

/** Map task status to a color escape. */
export function statusColor(status: TaskStatus): string {
  switch (status) {
    case 'PENDING':     return CYAN;
    case 'IN_PROGRESS': return GREEN;
    case 'DONE':        return DIM;
    case 'CANCELLED':   return DIM;
  }
}

/** Map task priority to a color escape. */
export function priorityColor(priority: TaskPriority): string {
  switch (priority) {
    case 'CRITICAL': return RED;
    case 'HIGH':     return YELLOW;
    case 'MEDIUM':   return BLUE;
    case 'LOW':      return DIM;
  }
}

/** Map an audit operation to a color escape. */
export function operationColor(operation: AuditOperation): string {
  switch (operation) {
    case 'CREATE': return GREEN;
    case 'UPDATE': return YELLOW;
    case 'DELETE': return RED;
  }
}

// ---------------------------------------------------------------------------
// Box drawing
// ---------------------------------------------------------------------------

export const BOX = unicodeEnabled
  ? { tl: '\u256D', tr: '\u256E', bl: '\u2570', br: '\u256F', h: '\u2500', v: '\u2502', ml: '\u251C', mr: '\u2524' }
  : { tl: '+', tr: '+', bl: '+', br: '+', h: '-', v: '|', ml: '+', mr: '+' };

/** Create a horizontal rule with box-drawing characters. */
export function hRule(width: number = 65): string {
  return BOX.h.repeat(width);
}

/** Format an ISO timestamp as YYYY-MM-DD HH:MM:SS (UTC). */
export function shortTimestamp(isoDate: string): string {
  const [date, time] = isoDate.split('T');
  if (date === undefined || time === undefined) return isoDate;
  return `${date} ${time.slice(0, 8)}`;
}
