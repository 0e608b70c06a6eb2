import { describe, it, expect, vi, afterEach } from 'vitest'
import { getTasks, exportTasks } from './store'

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('store', () => {
  it('loads tasks from the API', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(200, { tasks: [], sourceName: 'plan.xlsx' }))
    vi.stubGlobal('fetch', fetchMock)

    expect(await getTasks()).toEqual({ tasks: [], sourceName: 'plan.xlsx' })
    expect(fetchMock).toHaveBeenCalledWith('/api/tasks', { headers: { 'Content-Type': 'application/json' } })
  })

  it('posts rows and the uploaded source name on export', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(200, { fileName: 'a_updated.xlsx', message: 'Saved: a_updated.xlsx' }))
    vi.stubGlobal('fetch', fetchMock)
    const rows = [{ 'Task ID': 'A' }]

    expect(await exportTasks(rows, 'a.xlsx')).toEqual({ fileName: 'a_updated.xlsx', message: 'Saved: a_updated.xlsx' })
    expect(fetchMock).toHaveBeenCalledWith('/api/tasks/export', {
      headers: { 'Content-Type': 'application/json' },
      method: 'POST',
      body: JSON.stringify({ rows, sourceName: 'a.xlsx' }),
    })
  })

  it('turns an error response into an Error with the server message', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(422, { error: 'Spreadsheet is missing required columns: Progress' })))

    await expect(getTasks()).rejects.toThrow('Spreadsheet is missing required columns: Progress')
  })

  it('falls back to the status code when the error body is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 502 })))

    await expect(getTasks()).rejects.toThrow('Request failed: 502')
  })
})
