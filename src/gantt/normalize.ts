import type { RawRow, Task } from '../types'
import {
  COLUMNS,
  REQUIRED_COLUMNS,
  HEADER_ALIASES,
  STATUS_TODO,
  DEFAULT_CATEGORY,
  SchemaError,
  isTaskStatus,
  type ColumnName,
} from './schema'
import { parseTaskDate, formatTaskDate, toEpoch } from '../utils/dateUtils'

export type TaskRow = Record<ColumnName, string | number>

export interface NormalizeOptions {
  /** Header row as read from the sheet; derived from the row keys when omitted. */
  headers?: readonly string[]
}

// ── Cell coercion ────────────────────────────────────────────

function cellText(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number') return Number.isFinite(value) ? `${value}` : ''
  if (value instanceof Date) return parseTaskDate(value) ? formatTaskDate(value) : ''
  return String(value).trim()
}

function cellProgress(value: unknown): number {
  let n = Number.NaN
  if (typeof value === 'number') n = value
  else if (typeof value === 'string' && value.trim() !== '') n = Number(value.trim())
  if (!Number.isFinite(n)) return 0
  return Math.min(100, Math.max(0, n))
}

function cellDate(value: unknown): string | null {
  const date = parseTaskDate(value)
  return date ? formatTaskDate(date) : null
}

// ── Headers ──────────────────────────────────────────────────

function headersOf(rows: readonly RawRow[]): string[] {
  const seen = new Set<string>()
  for (const row of rows) Object.keys(row).forEach((k) => seen.add(k))
  return [...seen]
}

function canonicalHeader(header: string, translate: boolean): string {
  const trimmed = header.trim()
  return translate ? HEADER_ALIASES[trimmed] ?? trimmed : trimmed
}

function hasAliasHeaders(headers: readonly string[]): boolean {
  return headers.some((h) => HEADER_ALIASES[h.trim()] !== undefined)
}

function rekeyRow(row: RawRow, translate: boolean): RawRow {
  const out: RawRow = {}
  for (const [key, value] of Object.entries(row)) out[canonicalHeader(key, translate)] = value
  return out
}

// ── Ordering ─────────────────────────────────────────────────

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function compareStarts(sa: number | null, sb: number | null): number {
  if (sa === sb) return 0
  if (sa == null) return 1
  if (sb == null) return -1
  return sa - sb
}

/** Stable sort by (start, category, name), undated tasks last; each start is parsed once. */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return tasks
    .map((task) => ({ task, start: toEpoch(task.start) }))
    .sort(
      (a, b) =>
        compareStarts(a.start, b.start) ||
        compareText(a.task.category, b.task.category) ||
        compareText(a.task.name, b.task.name)
    )
    .map(({ task }) => task)
}

// ── Normalization ────────────────────────────────────────────

function rowToTask(row: RawRow, hasStatus: boolean): Task {
  const status = hasStatus ? cellText(row[COLUMNS.status]) : ''
  const category = cellText(row[COLUMNS.category])
  return {
    name: cellText(row[COLUMNS.name]),
    id: cellText(row[COLUMNS.id]),
    start: cellDate(row[COLUMNS.start]),
    end: cellDate(row[COLUMNS.end]),
    progress: cellProgress(row[COLUMNS.progress]),
    parentId: cellText(row[COLUMNS.parentId]),
    category: category === '' ? DEFAULT_CATEGORY : category,
    status: isTaskStatus(status) ? status : STATUS_TODO,
  }
}

/**
 * Validates and coerces raw sheet rows into the canonical, sorted task table.
 * Throws SchemaError when required columns are absent after alias translation;
 * every per-cell problem is coerced to a default instead.
 */
export function normalize(rawRows: readonly RawRow[], options: NormalizeOptions = {}): Task[] {
  // Rows without a header row come from a fully deleted table; a sheet's header row is always checked.
  if (options.headers === undefined && rawRows.length === 0) return []
  const rawHeaders = options.headers ?? headersOf(rawRows)

  const translate = hasAliasHeaders(rawHeaders)
  const headers = new Set(rawHeaders.map((h) => canonicalHeader(h, translate)))
  const hasStatus = headers.has(COLUMNS.status)

  const missing = REQUIRED_COLUMNS.filter((c) => c !== COLUMNS.status && !headers.has(c))
  if (missing.length > 0) throw new SchemaError(missing)

  return sortTasks(rawRows.map((row) => rowToTask(rekeyRow(row, translate), hasStatus)))
}

export function taskToRow(task: Task): TaskRow {
  return {
    [COLUMNS.name]: task.name,
    [COLUMNS.id]: task.id,
    [COLUMNS.start]: task.start ?? '',
    [COLUMNS.end]: task.end ?? '',
    [COLUMNS.progress]: task.progress,
    [COLUMNS.parentId]: task.parentId,
    [COLUMNS.category]: task.category,
    [COLUMNS.status]: task.status,
  }
}

/** Applies one free-text cell edit and rebuilds the whole table from scratch. */
export function applyCellEdit(tasks: readonly Task[], index: number, column: ColumnName, value: string): Task[] {
  const rows: RawRow[] = tasks.map((t, i) => (i === index ? { ...taskToRow(t), [column]: value } : taskToRow(t)))
  return normalize(rows, { headers: REQUIRED_COLUMNS })
}

export function deleteRow(tasks: readonly Task[], index: number): Task[] {
  const rows: RawRow[] = tasks.filter((_, i) => i !== index).map(taskToRow)
  return normalize(rows, { headers: REQUIRED_COLUMNS })
}
