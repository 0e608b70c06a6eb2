import { useState, useMemo } from 'react'
import { Segmented } from 'antd'
import { format } from 'date-fns'
import type { Scene, LegendEntry, BarArtifact } from './types'
import { getAxisTicks, timeToUnitOffset, getTotalUnits, type TimeUnit } from './utils/dateUtils'
import './GanttView.css'

const ROW_HEIGHT = 28
const BAR_HEIGHT = 18
const LABEL_WIDTH = 240
const ARROW_SIZE = 6

const UNIT_WIDTH_PX: Record<TimeUnit, number> = {
  day: 48,
  week: 140,
  month: 120,
}

const TIME_UNITS: { value: TimeUnit; label: string }[] = [
  { value: 'day', label: 'Day' },
  { value: 'week', label: 'Week' },
  { value: 'month', label: 'Month' },
]

interface GanttViewProps {
  scene: Scene
  onToggleGroup: (group: string) => void
}

function barTitle(bar: BarArtifact): string {
  const range = `${format(bar.start, 'yyyy-MM-dd HH:mm')} – ${format(bar.end, 'yyyy-MM-dd HH:mm')}`
  return `${bar.label} (${bar.taskId})\n${range}\n${bar.category} · ${bar.status} · ${bar.progress}%${
    bar.blocked ? '\nBLOCKED' : ''
  }`
}

function Legend({ entries, onToggleGroup }: { entries: LegendEntry[]; onToggleGroup: (group: string) => void }) {
  const titles = [...new Set(entries.map((e) => e.title))]
  return (
    <div className="gantt-legend">
      {titles.map((title) => (
        <div key={title} className="gantt-legend-group">
          <span className="gantt-legend-title">{title}</span>
          {entries
            .filter((e) => e.title === title)
            .map((entry) => (
              <button
                key={entry.group}
                type="button"
                className={`gantt-legend-item ${entry.visible ? '' : 'gantt-legend-item-hidden'}`}
                onClick={() => onToggleGroup(entry.group)}
                aria-pressed={!entry.visible}
              >
                <span className="gantt-legend-swatch" style={{ background: entry.color }} />
                {entry.label}
              </button>
            ))}
        </div>
      ))}
    </div>
  )
}

export function GanttView({ scene, onToggleGroup }: GanttViewProps) {
  const [timeUnit, setTimeUnit] = useState<TimeUnit>('day')
  const unitWidth = UNIT_WIDTH_PX[timeUnit]
  const { xRange } = scene

  const ticks = useMemo(
    () => (xRange ? getAxisTicks(xRange.start, xRange.end, timeUnit) : []),
    [xRange, timeUnit]
  )

  if (!xRange) {
    return (
      <div className="gantt-view">
        <div className="gantt-empty-wrap">
          <p className="gantt-empty">No tasks with both a start and an end date.</p>
        </div>
        <Legend entries={scene.legend} onToggleGroup={onToggleGroup} />
      </div>
    )
  }

  const chartWidth = Math.max(unitWidth, getTotalUnits(xRange.start, xRange.end, timeUnit) * unitWidth)
  const bodyHeight = scene.rows.length * ROW_HEIGHT
  const toPx = (epoch: number) => timeToUnitOffset(epoch, xRange.start, timeUnit) * unitWidth
  const rowCenter = (row: number) => row * ROW_HEIGHT + ROW_HEIGHT / 2
  const barTop = (row: number) => row * ROW_HEIGHT + (ROW_HEIGHT - BAR_HEIGHT) / 2

  return (
    <div className="gantt-view">
      <div className="gantt-toolbar">
        <Segmented<TimeUnit> size="small" value={timeUnit} options={TIME_UNITS} onChange={setTimeUnit} />
      </div>
      <div className="gantt-scroll" style={{ maxHeight: scene.height }}>
        <div className="gantt-container" style={{ width: LABEL_WIDTH + chartWidth }}>
          <div className="gantt-header">
            <div className="gantt-header-task" style={{ width: LABEL_WIDTH }}>
              Task
            </div>
            <div className="gantt-header-chart" style={{ width: chartWidth }}>
              {ticks.map((tick) => (
                <div
                  key={tick.date.getTime()}
                  className="gantt-header-tick"
                  style={{ left: tick.offsetUnits * unitWidth }}
                >
                  {tick.label}
                </div>
              ))}
            </div>
          </div>

          <div className="gantt-body" style={{ height: bodyHeight }}>
            <div className="gantt-labels" style={{ width: LABEL_WIDTH }}>
              {scene.rows.map((row, i) => (
                <div key={i} className="gantt-label" style={{ height: ROW_HEIGHT }} title={row.taskId}>
                  {row.label}
                </div>
              ))}
            </div>

            <div className="gantt-chart" style={{ left: LABEL_WIDTH, width: chartWidth, height: bodyHeight }}>
              {scene.weekendBands.map((band) => (
                <div
                  key={band.start}
                  className="gantt-weekend"
                  style={{ left: toPx(band.start), width: toPx(band.end) - toPx(band.start), background: band.color }}
                  aria-hidden
                />
              ))}

              {scene.bars
                .filter((bar) => bar.visible)
                .map((bar) => (
                  <div
                    key={bar.key}
                    className="gantt-bar"
                    title={barTitle(bar)}
                    style={{
                      left: toPx(bar.start),
                      width: Math.max(0, toPx(bar.end) - toPx(bar.start)),
                      top: barTop(bar.row),
                      height: BAR_HEIGHT,
                      background: bar.color,
                    }}
                  />
                ))}

              {scene.overlays
                .filter((overlay) => overlay.visible)
                .map((overlay) => (
                  <div
                    key={overlay.key}
                    className="gantt-progress"
                    title={`Progress: ${overlay.progress}%`}
                    style={{
                      left: toPx(overlay.start),
                      width: Math.max(0, toPx(overlay.end) - toPx(overlay.start)),
                      top: barTop(overlay.row),
                      height: BAR_HEIGHT,
                      background: overlay.color,
                      opacity: overlay.opacity,
                    }}
                  />
                ))}

              <svg className="gantt-dependency-svg" width={chartWidth} height={bodyHeight} aria-hidden>
                {scene.connectors
                  .filter((c) => c.visible)
                  .map((c) => {
                    const x1 = toPx(c.from.at)
                    const y1 = rowCenter(c.from.row)
                    const x2 = toPx(c.to.at)
                    const y2 = rowCenter(c.to.row)
                    return (
                      <g key={c.key}>
                        <line x1={x1} y1={y1} x2={x2} y2={y2} className="gantt-dependency-line" />
                        <polygon
                          className="gantt-dependency-arrow"
                          points={`${x2},${y2} ${x2 - ARROW_SIZE},${y2 - ARROW_SIZE / 2} ${x2 - ARROW_SIZE},${y2 + ARROW_SIZE / 2}`}
                        />
                      </g>
                    )
                  })}
              </svg>

              {scene.locks
                .filter((lock) => lock.visible)
                .map((lock) => (
                  <span
                    key={lock.key}
                    className="gantt-lock"
                    title={lock.hoverText}
                    style={{ left: toPx(lock.at), top: lock.row * ROW_HEIGHT, lineHeight: `${ROW_HEIGHT}px` }}
                  >
                    {lock.text}
                  </span>
                ))}

              {scene.now && (
                <div className="gantt-now-layer" aria-hidden>
                  <div className="gantt-now-line" style={{ left: toPx(scene.now.at), borderColor: scene.now.color }} />
                  <span className="gantt-now-label" style={{ left: toPx(scene.now.at), color: scene.now.color }}>
                    {scene.now.label}
                  </span>
                </div>
              )}
            </div>
          </div>
        </div>
      </div>
      <Legend entries={scene.legend} onToggleGroup={onToggleGroup} />
    </div>
  )
}
