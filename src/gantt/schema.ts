import type { TaskStatus } from '../types'

export const COLUMNS = {
  name: 'Task Name',
  id: 'Task ID',
  start: 'Start Date',
  end: 'End Date',
  progress: 'Progress',
  parentId: 'Parent Task',
  category: 'Category',
  status: 'Status',
} as const

export type ColumnName = (typeof COLUMNS)[keyof typeof COLUMNS]

/** Fixed column order for import validation and export. */
export const REQUIRED_COLUMNS: ColumnName[] = [
  COLUMNS.name,
  COLUMNS.id,
  COLUMNS.start,
  COLUMNS.end,
  COLUMNS.progress,
  COLUMNS.parentId,
  COLUMNS.category,
  COLUMNS.status,
]

/** Japanese workbook headers, translated 1:1 when any of them is present. */
export const HEADER_ALIASES: Record<string, ColumnName> = {
  項目名: COLUMNS.name,
  タスク管理ID: COLUMNS.id,
  開始日: COLUMNS.start,
  期限: COLUMNS.end,
  進捗: COLUMNS.progress,
  親タスク: COLUMNS.parentId,
  カテゴリ: COLUMNS.category,
  ステータス: COLUMNS.status,
}

export const STATUS_TODO: TaskStatus = 'To Do'
export const STATUS_IN_PROGRESS: TaskStatus = 'In progress'
export const STATUS_REVIEW: TaskStatus = 'Review'
export const STATUS_DONE: TaskStatus = 'Done'

export const STATUSES: readonly TaskStatus[] = [STATUS_TODO, STATUS_IN_PROGRESS, STATUS_REVIEW, STATUS_DONE]

export const DEFAULT_CATEGORY = 'Uncategorized'

export function isTaskStatus(value: string): value is TaskStatus {
  return STATUSES.some((s) => s === value)
}

export class SchemaError extends Error {
  readonly missingColumns: string[]

  constructor(missingColumns: string[]) {
    super(`Spreadsheet is missing required columns: ${missingColumns.join(', ')}`)
    this.name = 'SchemaError'
    this.missingColumns = missingColumns
  }
}
