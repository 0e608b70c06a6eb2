import path from 'path'
import express from 'express'
import type { Response } from 'express'
import cors from 'cors'
import { z } from 'zod'
import { normalize } from '../../src/gantt/normalize.js'
import { SchemaError } from '../../src/gantt/schema.js'
import { WorkbookError } from '../../src/gantt/workbook.js'
import type { TaskRepository } from './repository.js'

export const ExportBodySchema = z.object({
  rows: z.array(z.record(z.string(), z.unknown())),
  sourceName: z.string().trim().min(1).optional(),
})

export type ExportBody = z.infer<typeof ExportBodySchema>

function sendError(res: Response, err: unknown, fallback: string) {
  if (err instanceof SchemaError) {
    return res.status(422).json({ error: err.message, missingColumns: err.missingColumns })
  }
  if (err instanceof WorkbookError) {
    return res.status(422).json({ error: err.message })
  }
  console.error(err)
  return res.status(500).json({ error: fallback, detail: err instanceof Error ? err.message : undefined })
}

export function createApp(repository: TaskRepository) {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '10mb' }))
  app.use('/api', (_req, res, next) => {
    res.set('Cache-Control', 'no-store')
    next()
  })

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true })
  })

  // Load and reload both re-read the configured workbook from disk.
  app.get('/api/tasks', async (_req, res) => {
    try {
      const tasks = await repository.load()
      res.json({ tasks, sourceName: repository.sourceName })
    } catch (err) {
      sendError(res, err, 'Failed to load tasks')
    }
  })

  app.post('/api/tasks/export', async (req, res) => {
    const parsed = ExportBodySchema.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({ error: 'rows are required', detail: parsed.error.issues.map((i) => i.message) })
    }
    try {
      const { rows, sourceName } = parsed.data
      const tasks = normalize(rows)
      const outPath = await repository.save(tasks, repository.exportPath(sourceName))
      const fileName = path.basename(outPath)
      res.json({ fileName, message: `Saved: ${fileName}` })
    } catch (err) {
      sendError(res, err, 'Failed to export tasks')
    }
  })

  return app
}
