import { describe, it, expect } from 'vitest'
import { normalize, taskToRow, applyCellEdit, deleteRow, sortTasks } from './normalize'
import { SchemaError, COLUMNS, REQUIRED_COLUMNS } from './schema'
import type { RawRow, Task } from '../types'

function row(overrides: Partial<Record<string, unknown>> = {}): RawRow {
  return {
    'Task Name': 'Task',
    'Task ID': 'T',
    'Start Date': '2024-03-01',
    'End Date': '2024-03-02',
    Progress: 0,
    'Parent Task': '',
    Category: 'Alpha',
    Status: 'To Do',
    ...overrides,
  }
}

function taskFrom(id: string): Task {
  return {
    name: 'Same',
    id,
    start: '2024-03-01',
    end: '2024-03-02',
    progress: 0,
    parentId: '',
    category: 'Alpha',
    status: 'To Do',
  }
}

describe('normalize', () => {
  it('trims text, clamps progress and coerces unknown statuses', () => {
    const tasks = normalize([
      row({
        'Task Name': '  Design ',
        'Task ID': ' T2 ',
        'Start Date': '2024-03-04',
        'End Date': '2024/03/08',
        Progress: '150',
        'Parent Task': ' T1 ',
        Category: '',
        Status: 'Blocked',
      }),
      row({
        'Task Name': 'Plan',
        'Task ID': 'T1',
        'Start Date': '2024-03-01 09:30',
        'End Date': 'not a date',
        Progress: 'abc',
        Category: 'Alpha',
        Status: 'Done',
      }),
    ])

    expect(tasks).toEqual([
      {
        name: 'Plan',
        id: 'T1',
        start: '2024-03-01T09:30:00',
        end: null,
        progress: 0,
        parentId: '',
        category: 'Alpha',
        status: 'Done',
      },
      {
        name: 'Design',
        id: 'T2',
        start: '2024-03-04',
        end: '2024-03-08',
        progress: 100,
        parentId: 'T1',
        category: 'Uncategorized',
        status: 'To Do',
      },
    ])
  })

  it('coerces numeric and date cells', () => {
    const [task] = normalize([
      row({
        'Task ID': 7,
        'Parent Task': 3,
        'Start Date': new Date(2024, 2, 1, 8, 15),
        'End Date': 45292,
        Progress: -5,
        Status: null,
        Category: undefined,
      }),
    ])

    expect(task).toEqual({
      name: 'Task',
      id: '7',
      start: '2024-03-01T08:15:00',
      end: '2024-01-01',
      progress: 0,
      parentId: '3',
      category: 'Uncategorized',
      status: 'To Do',
    })
  })

  it('fills a missing Status column with To Do', () => {
    const rows = [row({ 'Task ID': 'A' }), row({ 'Task ID': 'B' })].map((r) =>
      Object.fromEntries(Object.entries(r).filter(([key]) => key !== 'Status'))
    )

    expect(normalize(rows).map((t) => t.status)).toEqual(['To Do', 'To Do'])
  })

  it('throws SchemaError listing every missing required column', () => {
    const rows = [{ 'Task Name': 'A', 'Task ID': 'A', 'End Date': '', 'Parent Task': '', Category: '' }]

    expect(() => normalize(rows)).toThrow(SchemaError)
    try {
      normalize(rows)
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError)
      if (err instanceof SchemaError) expect(err.missingColumns).toEqual(['Start Date', 'Progress'])
    }
  })

  it('validates against the header row even when the sheet has no data rows', () => {
    expect(normalize([], { headers: REQUIRED_COLUMNS })).toEqual([])
    expect(() => normalize([], { headers: ['Task Name'] })).toThrow(SchemaError)
  })

  it('rejects a sheet with an empty header row', () => {
    expect(() => normalize([], { headers: [] })).toThrow(SchemaError)
  })

  it('returns an empty table for no rows and no headers', () => {
    expect(normalize([])).toEqual([])
  })

  it('translates alternate-language headers onto canonical names', () => {
    const tasks = normalize([
      {
        項目名: '設計',
        タスク管理ID: 'J1',
        開始日: '2024-03-01',
        期限: '2024-03-03',
        進捗: 40,
        親タスク: '',
        カテゴリ: 'Alpha',
      },
    ])

    expect(tasks).toEqual([
      {
        name: '設計',
        id: 'J1',
        start: '2024-03-01',
        end: '2024-03-03',
        progress: 40,
        parentId: '',
        category: 'Alpha',
        status: 'To Do',
      },
    ])
  })

  it('sorts by start, then category, then name, with undated tasks last', () => {
    const tasks = normalize([
      row({ 'Task ID': 'undated', 'Start Date': '', Category: 'A' }),
      row({ 'Task ID': 'late', 'Start Date': '2024-03-05', Category: 'A' }),
      row({ 'Task ID': 'beta', 'Start Date': '2024-03-01', Category: 'Beta', 'Task Name': 'a' }),
      row({ 'Task ID': 'alpha-z', 'Start Date': '2024-03-01', Category: 'Alpha', 'Task Name': 'z' }),
      row({ 'Task ID': 'alpha-b', 'Start Date': '2024-03-01', Category: 'Alpha', 'Task Name': 'b' }),
    ])

    expect(tasks.map((t) => t.id)).toEqual(['alpha-b', 'alpha-z', 'beta', 'late', 'undated'])
  })

  it('is idempotent', () => {
    const once = normalize([
      row({ 'Task ID': 'B', 'Start Date': '2024/03/02 14:00', Progress: '55.5', Status: ' Review ' }),
      row({ 'Task ID': 'A', 'Start Date': 'garbage', Progress: 300, Category: ' ' }),
      row({ 'Task ID': 'C', 'Parent Task': 'A', 'End Date': new Date(2024, 2, 9) }),
    ])
    const twice = normalize(once.map(taskToRow))

    expect(twice).toEqual(once)
  })

  it('keeps tasks with unparseable dates in the table', () => {
    const tasks = normalize([row({ 'Task ID': 'X', 'Start Date': '31/31/2024' })])

    expect(tasks).toHaveLength(1)
    expect(tasks[0].start).toBeNull()
  })

  it('treats serial days beyond the date range as unparseable', () => {
    const tasks = normalize([
      row({ 'Task ID': 'text', 'Start Date': '123456789' }),
      row({ 'Task ID': 'number', 'Start Date': 1e9, 'End Date': 1e9 }),
    ])

    expect(tasks.map((t) => [t.id, t.start])).toEqual([
      ['text', null],
      ['number', null],
    ])
    expect(tasks[1].end).toBeNull()
  })
})

describe('sortTasks', () => {
  it('keeps equal keys in their original order', () => {
    const first: Task = taskFrom('first')
    const second: Task = taskFrom('second')

    expect(sortTasks([first, second]).map((t) => t.id)).toEqual(['first', 'second'])
    expect(sortTasks([second, first]).map((t) => t.id)).toEqual(['second', 'first'])
  })
})

describe('applyCellEdit', () => {
  const base = normalize([
    row({ 'Task ID': 'X', 'Start Date': '2024-03-01', Progress: 50 }),
    row({ 'Task ID': 'Y', 'Start Date': '2024-03-02', 'Parent Task': 'X' }),
  ])

  it('rebuilds and re-sorts the table after an edit', () => {
    const edited = applyCellEdit(base, 0, COLUMNS.start, '2024-03-10')

    expect(edited.map((t) => [t.id, t.start])).toEqual([
      ['Y', '2024-03-02'],
      ['X', '2024-03-10'],
    ])
    expect(base[0].start).toBe('2024-03-01')
  })

  it('coerces edited values like any other cell', () => {
    const edited = applyCellEdit(base, 0, COLUMNS.progress, 'lots')

    expect(edited[0].progress).toBe(0)
  })

  it('keeps the table usable when a date cell gets an out-of-range serial', () => {
    const edited = applyCellEdit(base, 0, COLUMNS.start, '123456789')

    expect(edited.map((t) => [t.id, t.start])).toEqual([
      ['Y', '2024-03-02'],
      ['X', null],
    ])
  })

  it('accepts a status picked from the dropdown', () => {
    const edited = applyCellEdit(base, 0, COLUMNS.status, 'In progress')

    expect(edited[0].status).toBe('In progress')
  })
})

describe('deleteRow', () => {
  it('removes the row and leaves the rest normalized', () => {
    const tasks = normalize([row({ 'Task ID': 'X' }), row({ 'Task ID': 'Y', 'Start Date': '2024-03-03' })])

    expect(deleteRow(tasks, 0).map((t) => t.id)).toEqual(['Y'])
  })
})
