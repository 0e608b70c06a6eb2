import 'dotenv/config'
import path from 'path'

export interface ServerConfig {
  port: number
  tasksPath: string
  sheet: string | number
}

const DEFAULT_PORT = 3001

// `KEY=` in .env counts as unset.
function nonBlank(raw: string | undefined): string | undefined {
  const value = raw?.trim() ?? ''
  return value === '' ? undefined : value
}

/** TASKS_SHEET may be a sheet name or a zero-based index. */
function parseSheet(raw: string | undefined): string | number {
  const value = nonBlank(raw)
  if (value === undefined) return 0
  return /^\d+$/.test(value) ? Number(value) : value
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: Number(nonBlank(env.PORT) ?? DEFAULT_PORT),
    tasksPath: path.resolve(nonBlank(env.TASKS_FILE) ?? path.join('data', 'tasks.csv')),
    sheet: parseSheet(env.TASKS_SHEET),
  }
}
