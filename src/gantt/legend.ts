import type { Task } from '../types'
import { STATUS_REVIEW, STATUS_DONE } from './schema'

export const REVIEW_GROUP = 'status:Review'
export const DONE_GROUP = 'status:Done'

export function categoryGroup(category: string): string {
  return `cat:${category}`
}

/** Legend group a task's bar, overlay and lock belong to; Review/Done override the category. */
export function taskLegendGroup(task: Pick<Task, 'status' | 'category'>): string {
  if (task.status === STATUS_REVIEW) return REVIEW_GROUP
  if (task.status === STATUS_DONE) return DONE_GROUP
  return categoryGroup(task.category)
}

/** Flips one group's visibility. Returns a new set; hidden-group state is owned by the caller. */
export function toggleGroup(hidden: ReadonlySet<string>, group: string): Set<string> {
  const next = new Set(hidden)
  if (next.has(group)) next.delete(group)
  else next.add(group)
  return next
}

export function isArtifactVisible(dependsOnGroups: readonly string[], hidden: ReadonlySet<string>): boolean {
  return !dependsOnGroups.some((g) => hidden.has(g))
}
