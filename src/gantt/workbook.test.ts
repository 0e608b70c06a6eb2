import * as XLSX from 'xlsx'
import { describe, it, expect } from 'vitest'
import { readWorkbook, writeWorkbook, exportMatrix, WorkbookError } from './workbook'
import { normalize } from './normalize'
import { SchemaError } from './schema'
import { parseTaskDate, formatTaskDate } from '../utils/dateUtils'
import type { Task } from '../types'

function emptyWorkbook(): Uint8Array {
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), 'Sheet1')
  const out: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' })
  return new Uint8Array(out)
}

const TASKS: Task[] = [
  {
    name: 'Plan',
    id: 'A1',
    start: '2024-03-01T09:30:00',
    end: '2024-03-05',
    progress: 50,
    parentId: '',
    category: 'Alpha',
    status: 'In progress',
  },
  {
    name: 'Build',
    id: 'A2',
    start: null,
    end: '2024-03-09',
    progress: 0,
    parentId: 'A1',
    category: 'Beta',
    status: 'To Do',
  },
]

describe('exportMatrix', () => {
  it('writes the canonical header and day-precision dates', () => {
    expect(exportMatrix(TASKS)).toEqual([
      ['Task Name', 'Task ID', 'Start Date', 'End Date', 'Progress', 'Parent Task', 'Category', 'Status'],
      ['Plan', 'A1', '2024-03-01', '2024-03-05', 50, '', 'Alpha', 'In progress'],
      ['Build', 'A2', '', '2024-03-09', 0, 'A1', 'Beta', 'To Do'],
    ])
  })
})

describe('readWorkbook', () => {
  it('reads back an exported workbook to day precision', () => {
    const { headers, rows } = readWorkbook(writeWorkbook(TASKS))

    expect(headers).toEqual([
      'Task Name',
      'Task ID',
      'Start Date',
      'End Date',
      'Progress',
      'Parent Task',
      'Category',
      'Status',
    ])
    expect(normalize(rows, { headers })).toEqual([
      { ...TASKS[0], start: '2024-03-01' },
      TASKS[1],
    ])
  })

  it('selects a sheet by name or index', () => {
    const data = writeWorkbook(TASKS)

    expect(readWorkbook(data, 'Sheet1').rows).toHaveLength(2)
    expect(readWorkbook(data, 0).rows).toHaveLength(2)
  })

  it('rejects a sheet that does not exist', () => {
    const data = writeWorkbook(TASKS)

    expect(() => readWorkbook(data, 'Missing')).toThrow(new WorkbookError('Sheet not found: Missing'))
    expect(() => readWorkbook(data, 3)).toThrow(WorkbookError)
  })

  it('parses delimited text', () => {
    const csv = new TextEncoder().encode('Task Name,Task ID,Category\nPlan,A1,Alpha\n')

    expect(readWorkbook(csv)).toEqual({
      headers: ['Task Name', 'Task ID', 'Category'],
      rows: [{ 'Task Name': 'Plan', 'Task ID': 'A1', Category: 'Alpha' }],
    })
  })

  it('keeps delimited dates on their calendar day outside UTC', () => {
    const csv = new TextEncoder().encode(
      [
        'Task Name,Task ID,Start Date,End Date,Progress,Parent Task,Category,Status',
        'Plan,A1,2026-10-05,2026-10-09,100,,Alpha,Done',
      ].join('\n')
    )
    const { headers, rows } = readWorkbook(csv)

    expect(new Date(2026, 9, 5).getTimezoneOffset()).toBe(-540)
    expect(normalize(rows, { headers })).toEqual([
      {
        name: 'Plan',
        id: 'A1',
        start: '2026-10-05',
        end: '2026-10-09',
        progress: 100,
        parentId: '',
        category: 'Alpha',
        status: 'Done',
      },
    ])
  })

  it('reads date cells stored as serial days as local days', () => {
    const workbook = XLSX.utils.book_new()
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Start Date'], [46300]]), 'Sheet1')
    const out: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' })
    const { rows } = readWorkbook(new Uint8Array(out))

    expect(rows).toEqual([{ 'Start Date': 46300 }])
    const date = parseTaskDate(rows[0]['Start Date'])
    expect(date && formatTaskDate(date)).toBe('2026-10-05')
  })

  it('returns no headers for a blank sheet, which fails the column check', () => {
    const sheet = readWorkbook(emptyWorkbook())

    expect(sheet).toEqual({ headers: [], rows: [] })
    expect(() => normalize(sheet.rows, { headers: sheet.headers })).toThrow(SchemaError)
  })
})
