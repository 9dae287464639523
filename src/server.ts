import cors from 'cors'
import express, { Request, Response } from 'express'
import type { Server } from 'http'
import multer from 'multer'
import { z } from 'zod'
import { errorMessage } from './errors'
import { parseIsoDay } from './feedback/dates'
import { FeedbackFilters, PRIORITIES, SENTIMENTS, SOURCES } from './feedback/types'
import type { Dataset, FeedbackInsightEngine } from './insights/engine'
import { scoped } from './logger'
import { csvItems, loadCsvFromText } from './sources/csvSource'

const log = scoped('server')

const day = z.string().refine((v) => parseIsoDay(v) !== null, 'expected a YYYY-MM-DD calendar day')

const search = z.string().trim().max(200).optional()

const commaList = <T extends string>(values: readonly [T, ...T[]]) =>
  z
    .string()
    .optional()
    .transform((v) => (v ? v.split(',').map((s) => s.trim()).filter(Boolean) : []))
    .pipe(z.array(z.enum(values)))

const FilterQuerySchema = z.object({
  start: day.optional(),
  end: day.optional(),
  source: commaList(SOURCES),
  sentiment: commaList(SENTIMENTS),
  priority: commaList(PRIORITIES),
  text: search,
  bucket: z.enum(['day', 'week']).default('day')
})

const FiltersBodySchema = z.object({
  dateRange: z.object({ start: day.optional(), end: day.optional() }).optional(),
  sources: z.array(z.enum(SOURCES)).optional(),
  sentiments: z.array(z.enum(SENTIMENTS)).optional(),
  priorities: z.array(z.enum(PRIORITIES)).optional(),
  text: search
})

const AskBodySchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  filters: FiltersBodySchema.optional()
})

const RegenerateBodySchema = z.object({
  count: z.number().int().min(1).max(5000).optional(),
  days: z.number().int().min(1).max(365).optional(),
  seed: z.number().int().optional()
})

type FilterQuery = z.infer<typeof FilterQuerySchema>

export function filtersFromQuery(q: FilterQuery): FeedbackFilters {
  return {
    dateRange: q.start || q.end ? { start: q.start, end: q.end } : undefined,
    sources: q.source,
    sentiments: q.sentiment,
    priorities: q.priority,
    text: q.text || undefined
  }
}

class BadRequest extends Error {}

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new BadRequest(parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; '))
  }
  return parsed.data
}

function fail(res: Response, e: unknown) {
  if (e instanceof BadRequest) return res.status(400).json({ error: e.message })
  log.error(errorMessage(e))
  return res.status(500).json({ error: errorMessage(e) })
}

const datasetSummary = (d: Dataset) => ({
  records: d.records.length,
  origin: d.origin,
  loadedAt: d.loadedAt,
  stats: d.stats,
  notices: d.notices
})

/** JSON API over one engine instance. */
export function createApp(engine: FeedbackInsightEngine) {
  const app = express()
  app.use(cors())
  app.use(express.json())

  // uploads stay in memory; they are parsed and discarded
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 10 * 1024 * 1024 } })

  app.get('/api/snapshot', (req: Request, res: Response) => {
    try {
      const q = parse(FilterQuerySchema, req.query)
      res.json(engine.snapshot(filtersFromQuery(q), q.bucket))
    } catch (e) {
      fail(res, e)
    }
  })

  app.get('/api/records', (req: Request, res: Response) => {
    try {
      const records = engine.records(filtersFromQuery(parse(FilterQuerySchema, req.query)))
      res.json({ total: records.length, records })
    } catch (e) {
      fail(res, e)
    }
  })

  app.get('/api/report', (req: Request, res: Response) => {
    try {
      res.json(engine.report(filtersFromQuery(parse(FilterQuerySchema, req.query))))
    } catch (e) {
      fail(res, e)
    }
  })

  app.post('/api/ask', async (req: Request, res: Response) => {
    try {
      const body = parse(AskBodySchema, req.body)
      res.json(await engine.ask(body.question, body.filters ?? {}))
    } catch (e) {
      fail(res, e)
    }
  })

  app.post('/api/regenerate', async (req: Request, res: Response) => {
    try {
      const body = parse(RegenerateBodySchema, req.body ?? {})
      res.json(datasetSummary(await engine.regenerate(body)))
    } catch (e) {
      fail(res, e)
    }
  })

  app.post('/api/upload', upload.single('file'), async (req: Request, res: Response) => {
    try {
      if (!req.file) throw new BadRequest('Missing file')
      const table = await loadCsvFromText(req.file.buffer)
      if (table.totalRows === 0) throw new BadRequest('CSV has no rows')
      const dataset = await engine.loadItems(csvItems(table), 'upload')
      res.json(datasetSummary(dataset))
    } catch (e) {
      fail(res, e)
    }
  })

  return app
}

export function startServer(engine: FeedbackInsightEngine, port: number): Promise<Server> {
  const app = createApp(engine)
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`listening on http://localhost:${port}`)
      resolve(server)
    })
    server.on('error', reject)
  })
}
