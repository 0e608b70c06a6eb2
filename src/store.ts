import type { RawRow, Task } from './types'

const API = import.meta.env.VITE_API_URL ?? '/api'

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API}${path}`, {
    headers: { 'Content-Type': 'application/json', ...init?.headers },
    ...init,
  })
  if (!res.ok) {
    const err = (await res.json().catch(() => ({}))) as { error?: string }
    throw new Error(err.error ?? `Request failed: ${res.status}`)
  }
  return res.json() as Promise<T>
}

export interface LoadedTasks {
  tasks: Task[]
  sourceName: string
}

export interface ExportResult {
  fileName: string
  message: string
}

/** Reads the configured workbook; also used for reload. */
export async function getTasks(): Promise<LoadedTasks> {
  return request<LoadedTasks>('/tasks')
}

export async function exportTasks(rows: RawRow[], sourceName?: string): Promise<ExportResult> {
  return request<ExportResult>('/tasks/export', {
    method: 'POST',
    body: JSON.stringify({ rows, sourceName }),
  })
}
