import fs from 'fs/promises'
import path from 'path'
import type { Task } from '../../src/types.js'
import { normalize } from '../../src/gantt/normalize.js'
import { readWorkbook, writeWorkbook } from '../../src/gantt/workbook.js'

export const EXPORT_SUFFIX = '_updated'

export class IOError extends Error {
  readonly operation: 'read' | 'write'
  readonly filePath: string

  constructor(operation: 'read' | 'write', filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to ${operation} ${filePath}: ${reason}`)
    this.name = 'IOError'
    this.operation = operation
    this.filePath = filePath
  }
}

export interface TaskRepository {
  /** Base name of the configured workbook. */
  readonly sourceName: string
  load(): Promise<Task[]>
  exportPath(sourceName?: string): string
  save(tasks: readonly Task[], outPath: string): Promise<string>
}

/** `<stem>_updated.xlsx`; any directory part of the source name is ignored. */
export function exportFileName(sourceName: string): string {
  const stem = path.parse(path.basename(sourceName)).name
  return `${stem === '' ? 'tasks' : stem}${EXPORT_SUFFIX}.xlsx`
}

export function createExcelRepository(xlsxPath: string, sheet: string | number = 0): TaskRepository {
  const sourceName = path.basename(xlsxPath)

  async function load(): Promise<Task[]> {
    let data: Buffer
    try {
      data = await fs.readFile(xlsxPath)
    } catch (err) {
      throw new IOError('read', xlsxPath, err)
    }
    const { headers, rows } = readWorkbook(data, sheet)
    return normalize(rows, { headers })
  }

  function exportPath(uploadedName?: string): string {
    return path.join(path.dirname(xlsxPath), exportFileName(uploadedName ?? sourceName))
  }

  async function save(tasks: readonly Task[], outPath: string): Promise<string> {
    try {
      await fs.writeFile(outPath, writeWorkbook(tasks))
    } catch (err) {
      throw new IOError('write', outPath, err)
    }
    return outPath
  }

  return { sourceName, load, exportPath, save }
}
