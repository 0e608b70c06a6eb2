import { addDays } from 'date-fns'
import type {
  Task,
  DependencyEdge,
  Scene,
  SceneContext,
  BarArtifact,
  ProgressArtifact,
  LockArtifact,
  ConnectorArtifact,
  WeekendBand,
  LegendEntry,
  NowMarker,
} from '../types'
import { STATUS_TODO, STATUS_IN_PROGRESS } from './schema'
import { taskLegendGroup, categoryGroup, isArtifactVisible, REVIEW_GROUP, DONE_GROUP } from './legend'
import { toEpoch, addOneDay, eachDayInRange } from '../utils/dateUtils'

// Default qualitative palette, handed out in order of first appearance.
export const CATEGORY_PALETTE = [
  '#636efa',
  '#EF553B',
  '#00cc96',
  '#ab63fa',
  '#FFA15A',
  '#19d3f3',
  '#FF6692',
  '#B6E880',
  '#FF97FF',
  '#FECB52',
] as const

export const REVIEW_COLOR = 'rgba(160,160,160,0.85)'
export const DONE_COLOR = 'rgba(90,90,90,0.90)'
export const PROGRESS_COLOR = 'rgba(0,0,0,0.35)'
export const PROGRESS_OPACITY = 0.3
export const SATURDAY_COLOR = 'rgba(173, 216, 230, 0.25)'
export const SUNDAY_COLOR = 'rgba(255, 182, 193, 0.30)'
export const NOW_COLOR = 'red'
export const LOCK_TEXT = '🔒'
export const BLOCKED_HOVER = 'BLOCKED (Parent task incomplete)'

const MIN_HEIGHT = 520
const ROW_HEIGHT = 28
const CHROME_HEIGHT = 260

interface ChartedTask {
  task: Task
  row: number
  start: number
  end: number
  group: string
}

export function chartHeight(rowCount: number): number {
  return Math.max(MIN_HEIGHT, ROW_HEIGHT * Math.max(rowCount, 1) + CHROME_HEIGHT)
}

function isCategoryColored(task: Task): boolean {
  return task.status === STATUS_TODO || task.status === STATUS_IN_PROGRESS
}

function assignCategoryColors(charted: readonly ChartedTask[]): Map<string, string> {
  const colors = new Map<string, string>()
  for (const { task } of charted) {
    if (!isCategoryColored(task) || colors.has(task.category)) continue
    colors.set(task.category, CATEGORY_PALETTE[colors.size % CATEGORY_PALETTE.length])
  }
  return colors
}

function barColor(task: Task, categoryColors: ReadonlyMap<string, string>): string {
  if (isCategoryColored(task)) return categoryColors.get(task.category) ?? CATEGORY_PALETTE[0]
  return taskLegendGroup(task) === REVIEW_GROUP ? REVIEW_COLOR : DONE_COLOR
}

export function buildWeekendBands(min: number, max: number): WeekendBand[] {
  const bands: WeekendBand[] = []
  for (const day of eachDayInRange(min, max)) {
    const weekday = day.getDay()
    if (weekday !== 6 && weekday !== 0) continue
    bands.push({
      day: weekday === 6 ? 'saturday' : 'sunday',
      start: day.getTime(),
      end: addDays(day, 1).getTime(),
      color: weekday === 6 ? SATURDAY_COLOR : SUNDAY_COLOR,
    })
  }
  return bands
}

function buildLegend(
  categoryColors: ReadonlyMap<string, string>,
  hidden: ReadonlySet<string>
): LegendEntry[] {
  const entries: LegendEntry[] = [...categoryColors].map(([category, color]): LegendEntry => ({
    group: categoryGroup(category),
    label: category,
    title: 'Category',
    color,
    visible: !hidden.has(categoryGroup(category)),
  }))
  // Status toggles exist even when no task currently carries that status.
  entries.push(
    { group: REVIEW_GROUP, label: 'Review', title: 'Status', color: REVIEW_COLOR, visible: !hidden.has(REVIEW_GROUP) },
    { group: DONE_GROUP, label: 'Done', title: 'Status', color: DONE_COLOR, visible: !hidden.has(DONE_GROUP) }
  )
  return entries
}

/**
 * Derives the render-ready chart description from the canonical table and the
 * resolver output. Artifacts tagged with a hidden group stay in the scene with
 * `visible: false`.
 */
export function buildScene(
  tasks: readonly Task[],
  blocked: ReadonlyMap<string, boolean>,
  edges: readonly DependencyEdge[],
  context: SceneContext
): Scene {
  const hidden = context.hiddenGroups
  const charted: ChartedTask[] = []
  for (const task of tasks) {
    const start = toEpoch(task.start)
    const end = toEpoch(task.end)
    if (start == null || end == null) continue
    charted.push({ task, row: charted.length, start, end, group: taskLegendGroup(task) })
  }

  const categoryColors = assignCategoryColors(charted)
  const bars: BarArtifact[] = []
  const overlays: ProgressArtifact[] = []
  const locks: LockArtifact[] = []

  for (const { task, row, start, end, group } of charted) {
    const dependsOnGroups = [group]
    const visible = isArtifactVisible(dependsOnGroups, hidden)
    const isTaskBlocked = blocked.get(task.id) ?? false
    bars.push({
      kind: 'bar',
      key: `bar:${row}`,
      taskId: task.id,
      row,
      label: task.name,
      start,
      end,
      color: barColor(task, categoryColors),
      legendGroup: group,
      status: task.status,
      category: task.category,
      progress: task.progress,
      blocked: isTaskBlocked,
      dependsOnGroups,
      visible,
    })
    overlays.push({
      kind: 'progress',
      key: `progress:${row}`,
      taskId: task.id,
      row,
      start,
      end: start + ((end - start) * task.progress) / 100,
      progress: task.progress,
      color: PROGRESS_COLOR,
      opacity: PROGRESS_OPACITY,
      legendGroup: group,
      dependsOnGroups: [group],
      visible,
    })
    if (isTaskBlocked) {
      locks.push({
        kind: 'lock',
        key: `lock:${row}`,
        taskId: task.id,
        row,
        at: start,
        text: LOCK_TEXT,
        hoverText: BLOCKED_HOVER,
        dependsOnGroups: [group],
        visible,
      })
    }
  }

  const chartedById = new Map(charted.map((c) => [c.task.id, c]))
  const connectors: ConnectorArtifact[] = []
  edges.forEach(({ parentId, childId }, i) => {
    const parent = chartedById.get(parentId)
    const child = chartedById.get(childId)
    if (!parent || !child) return
    const dependsOnGroups = [parent.group, child.group]
    connectors.push({
      kind: 'connector',
      key: `dep:${i}:${parentId}->${childId}`,
      parentId,
      childId,
      from: { at: parent.end, row: parent.row },
      to: { at: child.start, row: child.row },
      marker: 'triangle-right',
      dependsOnGroups,
      visible: isArtifactVisible(dependsOnGroups, hidden),
    })
  })

  let xRange: Scene['xRange'] = null
  let weekendBands: WeekendBand[] = []
  let now: NowMarker | null = null
  if (charted.length > 0) {
    const min = charted.reduce((acc, c) => Math.min(acc, c.start), Number.POSITIVE_INFINITY)
    const max = charted.reduce((acc, c) => Math.max(acc, c.end), Number.NEGATIVE_INFINITY)
    xRange = { start: min, end: addOneDay(max) }
    weekendBands = buildWeekendBands(min, max)
    const current = (context.now ?? new Date()).getTime()
    if (min <= current && current <= max) now = { at: current, label: 'NOW', color: NOW_COLOR }
  }

  return {
    rows: charted.map(({ task }) => ({ taskId: task.id, label: task.name })),
    bars,
    overlays,
    locks,
    connectors,
    weekendBands,
    now,
    legend: buildLegend(categoryColors, hidden),
    xRange,
    height: chartHeight(charted.length),
  }
}
