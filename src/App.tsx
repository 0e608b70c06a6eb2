import { useState, useCallback, useEffect, useMemo } from 'react'
import { Alert, Button, Space, Spin, Upload } from 'antd'
import { ReloadOutlined, UploadOutlined, SaveOutlined } from '@ant-design/icons'
import { getTasks, exportTasks } from './store'
import type { Task } from './types'
import { buildBoard, toggleGroup, applyCellEdit, deleteRow, normalize, taskToRow, type ColumnName } from './gantt'
import { readWorkbook } from './gantt/workbook'
import { TaskList } from './TaskList'
import { GanttView } from './GanttView'
import './App.css'

interface Source {
  name: string
  uploaded: boolean
}

export default function App() {
  const [tasks, setTasks] = useState<Task[]>([])
  const [source, setSource] = useState<Source | null>(null)
  const [hiddenGroups, setHiddenGroups] = useState<ReadonlySet<string>>(new Set())
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)
  const [message, setMessage] = useState<string | null>(null)

  const refreshTasks = useCallback(async () => {
    try {
      const data = await getTasks()
      setTasks(data.tasks)
      setSource({ name: data.sourceName, uploaded: false })
      setError(null)
    } catch (e) {
      setError(e instanceof Error ? e.message : 'Failed to load tasks')
    }
  }, [])

  useEffect(() => {
    refreshTasks().finally(() => setLoading(false))
  }, [refreshTasks])

  // Every change produces a new table; resolver and scene are rebuilt from it in full.
  const board = useMemo(() => buildBoard(tasks, { hiddenGroups }), [tasks, hiddenGroups])

  // ── Handlers ──────────────────────────────────────────────

  const handleReload = async () => {
    setLoading(true)
    setMessage(null)
    await refreshTasks()
    setLoading(false)
  }

  const handleUpload = async (file: File) => {
    try {
      const { headers, rows } = readWorkbook(await file.arrayBuffer())
      setTasks(normalize(rows, { headers }))
      setSource({ name: file.name, uploaded: true })
      setError(null)
      setMessage(`Loaded: ${file.name}`)
    } catch (e) {
      setError(e instanceof Error ? e.message : 'Failed to read the uploaded file')
    }
  }

  const handleExport = async () => {
    try {
      const result = await exportTasks(tasks.map(taskToRow), source?.uploaded ? source.name : undefined)
      setMessage(result.message)
      setError(null)
    } catch (e) {
      setError(e instanceof Error ? e.message : 'Failed to export tasks')
    }
  }

  const handleEditCell = (index: number, column: ColumnName, value: string) => {
    setTasks((prev) => applyCellEdit(prev, index, column, value))
  }

  const handleDeleteRow = (index: number) => {
    setTasks((prev) => deleteRow(prev, index))
  }

  const handleToggleGroup = (group: string) => {
    setHiddenGroups((prev) => toggleGroup(prev, group))
  }

  return (
    <div className="app">
      <header className="app-header">
        <h1 className="app-title">Spreadsheet → Gantt</h1>
        <Space>
          <Button icon={<ReloadOutlined />} onClick={handleReload}>
            Reload workbook
          </Button>
          <Upload
            accept=".xlsx,.xls,.csv"
            showUploadList={false}
            beforeUpload={(file) => {
              void handleUpload(file)
              return false
            }}
          >
            <Button icon={<UploadOutlined />}>Upload workbook</Button>
          </Upload>
          <Button type="primary" icon={<SaveOutlined />} onClick={handleExport}>
            Export updated workbook
          </Button>
          {source && <span className="app-source">{source.name}</span>}
        </Space>
      </header>

      {error && <Alert type="error" message={error} showIcon closable onClose={() => setError(null)} />}
      {message && <Alert type="success" message={message} showIcon closable onClose={() => setMessage(null)} />}

      {loading ? (
        <div className="app-loading">
          <Spin />
        </div>
      ) : (
        <main className="app-main">
          <section className="app-panel app-panel-table">
            <h2 className="app-panel-title">Task table</h2>
            <TaskList
              tasks={tasks}
              blocked={board.resolution.blocked}
              onEditCell={handleEditCell}
              onDeleteRow={handleDeleteRow}
            />
          </section>
          <section className="app-panel app-panel-chart">
            <h2 className="app-panel-title">Gantt chart</h2>
            <GanttView scene={board.scene} onToggleGroup={handleToggleGroup} />
          </section>
        </main>
      )}
    </div>
  )
}
