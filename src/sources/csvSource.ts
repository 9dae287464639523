import appRoot from 'app-root-path'
import { parse } from 'csv-parse/sync'
import fs from 'fs/promises'
import path from 'path'
import { DAY_MS, isoDay, startOfUtcDay } from '../feedback/dates'
import type { CsvRowItem } from '../feedback/types'
import { atomicWrite } from '../interfaces/atomicWrite'
import { debug } from '../logger'
import sampleRows from './sample-feedback.json'

export type CsvTable = {
  columns: string[]
  rows: Record<string, string>[]
  totalRows: number
  truncated: boolean
}

function toRow(value: unknown): Record<string, string> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null
  const row: Record<string, string> = {}
  for (const [key, cell] of Object.entries(value)) {
    if (typeof cell === 'string') row[key] = cell
  }
  return row
}

/** Header-keyed rows; a leading BOM and ragged rows are tolerated. */
export async function loadCsvFromText(text: string | Buffer, maxRows = Infinity): Promise<CsvTable> {
  const parsed: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  })
  const records = (Array.isArray(parsed) ? parsed : []).flatMap<Record<string, string>>((r) => toRow(r) ?? [])

  const totalRows = records.length
  const truncated = totalRows > maxRows
  const rows = records.slice(0, maxRows)
  const columns = rows.length > 0 ? Object.keys(rows[0]) : []
  debug('CSV parsed', { columns, totalRows, truncated })

  return { columns, rows, totalRows, truncated }
}

const root = appRoot.path

export async function loadCsvFromFile(filePath: string, maxRows = Infinity): Promise<CsvTable> {
  const absPath = path.resolve(root, filePath)
  const text = await fs.readFile(absPath, 'utf-8')
  return loadCsvFromText(text, maxRows)
}

export const csvItems = (table: CsvTable): CsvRowItem[] => table.rows.map((row) => ({ kind: 'csv', row }))

function csv(s: string) {
  return /[",\n\r]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s
}

/** Demo survey export with the columns the importer understands, dated relative to `now`. */
export function sampleCsv(now: Date = new Date()): string {
  const today = startOfUtcDay(now.getTime())
  const lines = ['id,text,rating,date,author'].concat(
    sampleRows.map((r, i) =>
      [`s${i}`, r.text, String(r.rating), isoDay(new Date(today - r.daysAgo * DAY_MS)), r.author].map(csv).join(',')
    )
  )
  return lines.join('\n') + '\n'
}

export async function writeSampleCsv(filePath: string, now?: Date): Promise<string> {
  return atomicWrite(path.resolve(root, filePath), sampleCsv(now))
}
