import * as XLSX from 'xlsx'
import type { RawRow, Task } from '../types'
import { REQUIRED_COLUMNS } from './schema'
import { formatDay } from '../utils/dateUtils'

export interface SheetData {
  headers: string[]
  rows: RawRow[]
}

export class WorkbookError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WorkbookError'
  }
}

export const EXPORT_SHEET_NAME = 'Sheet1'

function pickSheet(workbook: XLSX.WorkBook, sheet: string | number): XLSX.WorkSheet {
  const sheetName = typeof sheet === 'number' ? workbook.SheetNames[sheet] : sheet
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName]
  if (!worksheet) throw new WorkbookError(`Sheet not found: ${sheet}`)
  return worksheet
}

/**
 * First row is the header. Binary workbooks keep numbers (date cells as serial
 * days); delimited text stays unparsed so dates are read as local calendar days.
 */
export function readWorkbook(data: ArrayBuffer | Uint8Array, sheet: string | number = 0): SheetData {
  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(data, { type: 'array', raw: true })
  } catch (err) {
    throw new WorkbookError(err instanceof Error ? err.message : 'Unreadable spreadsheet')
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(pickSheet(workbook, sheet), {
    header: 1,
    blankrows: false,
    defval: '',
    raw: true,
  })
  const [headerRow = [], ...body] = matrix
  const headers = headerRow.map((h) => String(h ?? '').trim())
  const rows = body.map((cells) => {
    const row: RawRow = {}
    headers.forEach((header, i) => {
      if (header !== '') row[header] = cells[i] ?? ''
    })
    return row
  })
  return { headers: headers.filter((h) => h !== ''), rows }
}

/** Export layout: canonical headers in fixed order, dates truncated to the day. */
export function exportMatrix(tasks: readonly Task[]): (string | number)[][] {
  return [
    [...REQUIRED_COLUMNS],
    ...tasks.map((t) => [
      t.name,
      t.id,
      formatDay(t.start),
      formatDay(t.end),
      t.progress,
      t.parentId,
      t.category,
      t.status,
    ]),
  ]
}

export function writeWorkbook(tasks: readonly Task[]): Uint8Array {
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(exportMatrix(tasks)), EXPORT_SHEET_NAME)
  const out: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' })
  return new Uint8Array(out)
}
