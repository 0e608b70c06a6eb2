import { useState, useCallback } from 'react'
import { Button, Input, Popconfirm, Select, Tag } from 'antd'
import { DeleteOutlined } from '@ant-design/icons'
import type { Task, TaskStatus } from './types'
import { COLUMNS, STATUSES, type ColumnName } from './gantt/schema'
import { taskToRow } from './gantt/normalize'
import './TaskList.css'

// ── Types ────────────────────────────────────────────────────

interface TaskListProps {
  tasks: Task[]
  blocked: ReadonlyMap<string, boolean>
  onEditCell: (index: number, column: ColumnName, value: string) => void
  onDeleteRow: (index: number) => void
}

interface EditingCell {
  index: number
  column: ColumnName
}

// Status has its own dropdown; every other column is free text.
const TEXT_COLUMNS: { column: ColumnName; className: string }[] = [
  { column: COLUMNS.name, className: 'tl-col-name' },
  { column: COLUMNS.id, className: 'tl-col-id' },
  { column: COLUMNS.start, className: 'tl-col-date' },
  { column: COLUMNS.end, className: 'tl-col-date' },
  { column: COLUMNS.progress, className: 'tl-col-progress' },
  { column: COLUMNS.parentId, className: 'tl-col-id' },
  { column: COLUMNS.category, className: 'tl-col-category' },
]

const STATUS_OPTIONS = STATUSES.map((s) => ({ label: s, value: s }))

// ── Component ────────────────────────────────────────────────

export function TaskList({ tasks, blocked, onEditCell, onDeleteRow }: TaskListProps) {
  const [editing, setEditing] = useState<EditingCell | null>(null)
  const [draft, setDraft] = useState('')

  const startEditing = (index: number, column: ColumnName, current: string | number) => {
    setEditing({ index, column })
    setDraft(String(current))
  }

  const commit = useCallback(() => {
    if (!editing) return
    const current = String(taskToRow(tasks[editing.index])[editing.column])
    if (draft !== current) onEditCell(editing.index, editing.column, draft)
    setEditing(null)
  }, [editing, draft, tasks, onEditCell])

  if (tasks.length === 0) {
    return (
      <div className="tl-panel">
        <div className="tl-empty">
          <span className="tl-empty-text">No tasks. Reload the workbook or upload one.</span>
        </div>
      </div>
    )
  }

  return (
    <div className="tl-panel">
      <div className="tl-header-row">
        {TEXT_COLUMNS.map(({ column, className }) => (
          <div key={column} className={`tl-col ${className}`}>
            <span className="tl-col-label">{column}</span>
          </div>
        ))}
        <div className="tl-col tl-col-status">
          <span className="tl-col-label">{COLUMNS.status}</span>
        </div>
        <div className="tl-col tl-col-blocked">
          <span className="tl-col-label">Blocked</span>
        </div>
        <div className="tl-col tl-col-actions" />
      </div>

      <div className="tl-body">
        {tasks.map((task, index) => {
          const row = taskToRow(task)
          const isBlocked = blocked.get(task.id) ?? false
          return (
            <div key={`${index}:${task.id}`} className="tl-row">
              {TEXT_COLUMNS.map(({ column, className }) => {
                const isEditing = editing?.index === index && editing.column === column
                return (
                  <div key={column} className={`tl-col ${className}`}>
                    {isEditing ? (
                      <Input
                        size="small"
                        autoFocus
                        value={draft}
                        onChange={(e) => setDraft(e.target.value)}
                        onBlur={commit}
                        onPressEnter={commit}
                        onKeyDown={(e) => {
                          if (e.key === 'Escape') setEditing(null)
                        }}
                      />
                    ) : (
                      <button
                        type="button"
                        className="tl-cell"
                        onClick={() => startEditing(index, column, row[column])}
                      >
                        {row[column] === '' ? '—' : String(row[column])}
                      </button>
                    )}
                  </div>
                )
              })}
              <div className="tl-col tl-col-status">
                <Select<TaskStatus>
                  size="small"
                  value={task.status}
                  options={STATUS_OPTIONS}
                  onChange={(value) => onEditCell(index, COLUMNS.status, value)}
                  style={{ width: '100%' }}
                />
              </div>
              <div className="tl-col tl-col-blocked">
                {isBlocked ? <Tag color="red">BLOCKED</Tag> : <Tag>OK</Tag>}
              </div>
              <div className="tl-col tl-col-actions">
                <Popconfirm title="Delete this row?" onConfirm={() => onDeleteRow(index)}>
                  <Button size="small" type="text" danger icon={<DeleteOutlined />} aria-label="Delete row" />
                </Popconfirm>
              </div>
            </div>
          )
        })}
      </div>
    </div>
  )
}
