export type TaskStatus = 'To Do' | 'In progress' | 'Review' | 'Done'

export interface Task {
  name: string
  id: string
  start: string | null // canonical local timestamp, null when unparseable
  end: string | null
  progress: number // 0..100
  parentId: string // '' = no parent
  category: string
  status: TaskStatus
}

/** One spreadsheet row keyed by header text, before normalization. */
export type RawRow = Record<string, unknown>

export interface DependencyEdge {
  parentId: string
  childId: string
}

export interface Resolution {
  blocked: Map<string, boolean>
  edges: DependencyEdge[]
}

// ── Scene ────────────────────────────────────────────────────

interface ArtifactBase {
  key: string
  dependsOnGroups: string[]
  visible: boolean
}

export interface BarArtifact extends ArtifactBase {
  kind: 'bar'
  taskId: string
  row: number
  label: string
  start: number // epoch ms
  end: number
  color: string
  legendGroup: string
  status: TaskStatus
  category: string
  progress: number
  blocked: boolean
}

export interface ProgressArtifact extends ArtifactBase {
  kind: 'progress'
  taskId: string
  row: number
  start: number
  end: number
  progress: number
  color: string
  opacity: number
  legendGroup: string
}

export interface LockArtifact extends ArtifactBase {
  kind: 'lock'
  taskId: string
  row: number
  at: number
  text: string
  hoverText: string
}

export interface ConnectorArtifact extends ArtifactBase {
  kind: 'connector'
  parentId: string
  childId: string
  from: { at: number; row: number }
  to: { at: number; row: number }
  marker: 'triangle-right'
}

export type SceneArtifact = BarArtifact | ProgressArtifact | LockArtifact | ConnectorArtifact

export interface WeekendBand {
  day: 'saturday' | 'sunday'
  start: number
  end: number
  color: string
}

export interface NowMarker {
  at: number
  label: string
  color: string
}

export interface LegendEntry {
  group: string
  label: string
  title: 'Category' | 'Status'
  color: string
  visible: boolean
}

export interface SceneRow {
  taskId: string
  label: string
}

export interface Scene {
  rows: SceneRow[]
  bars: BarArtifact[]
  overlays: ProgressArtifact[]
  locks: LockArtifact[]
  connectors: ConnectorArtifact[]
  weekendBands: WeekendBand[]
  now: NowMarker | null
  legend: LegendEntry[]
  xRange: { start: number; end: number } | null
  height: number
}

export interface SceneContext {
  hiddenGroups: ReadonlySet<string>
  now?: Date
}
