import type { Task, DependencyEdge, Resolution } from '../types'

/** id → progress; with duplicate ids the row that comes last in the table wins. */
export function buildProgressLookup(tasks: readonly Task[]): Map<string, number> {
  const lookup = new Map<string, number>()
  for (const task of tasks) lookup.set(task.id, task.progress)
  return lookup
}

export function isBlocked(task: Task, progressById: ReadonlyMap<string, number>): boolean {
  if (task.parentId === '') return false
  const parentProgress = progressById.get(task.parentId)
  if (parentProgress === undefined) return true
  return parentProgress < 100
}

/**
 * Blocked flags and parent → child edges for the whole table.
 * A task naming itself as parent is passed through: it gets a self edge and
 * stays blocked until its own progress reaches 100.
 */
export function resolve(tasks: readonly Task[]): Resolution {
  const progressById = buildProgressLookup(tasks)
  const blocked = new Map<string, boolean>()
  const edges: DependencyEdge[] = []
  for (const task of tasks) {
    blocked.set(task.id, isBlocked(task, progressById))
    if (task.parentId !== '' && progressById.has(task.parentId)) {
      edges.push({ parentId: task.parentId, childId: task.id })
    }
  }
  return { blocked, edges }
}
