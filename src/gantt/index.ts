import type { Task, Resolution, Scene, SceneContext } from '../types'
import { resolve } from './dependencies'
import { buildScene } from './scene'

export * from './schema'
export { normalize, taskToRow, applyCellEdit, deleteRow, sortTasks } from './normalize'
export type { TaskRow, NormalizeOptions } from './normalize'
export { resolve, isBlocked, buildProgressLookup } from './dependencies'
export { buildScene, buildWeekendBands, chartHeight } from './scene'
export { taskLegendGroup, categoryGroup, toggleGroup, isArtifactVisible, REVIEW_GROUP, DONE_GROUP } from './legend'

export interface Board {
  resolution: Resolution
  scene: Scene
}

/** Resolver + layout for one snapshot of the canonical table; run again after every change. */
export function buildBoard(tasks: readonly Task[], context: SceneContext): Board {
  const resolution = resolve(tasks)
  return {
    resolution,
    scene: buildScene(tasks, resolution.blocked, resolution.edges, context),
  }
}
