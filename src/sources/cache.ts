import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { errorMessage } from '../errors'
import type { SourceItem } from '../feedback/types'
import { atomicWrite } from '../interfaces/atomicWrite'
import { scoped } from '../logger'

const log = scoped('cache')

const opt = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((v) => v ?? undefined)

const SourceItemSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('google_play'),
    reviewId: opt(z.string()),
    content: opt(z.string()),
    score: z.number().nullish(),
    at: z.string().nullish(),
    userName: opt(z.string()),
    reviewCreatedVersion: z.string().nullish()
  }),
  z.object({
    kind: z.literal('app_store'),
    id: opt(z.string()),
    title: opt(z.string()),
    content: opt(z.string()),
    rating: z.union([z.number(), z.string()]).nullish(),
    updated: opt(z.string()),
    author: opt(z.string()),
    version: opt(z.string())
  }),
  z.object({
    kind: z.literal('csv'),
    row: z.record(z.string().optional())
  }),
  z.object({
    kind: z.literal('synthetic'),
    id: z.string(),
    text: z.string(),
    rating: opt(z.number()),
    date: z.string(),
    author: opt(z.string()),
    version: opt(z.string())
  })
])

const CacheFileSchema = z.object({
  savedAt: z.number(),
  items: z.array(SourceItemSchema)
})

export interface CachedItems {
  items: SourceItem[]
  savedAt: Date
  ageHours: number
}

/** Last successfully collected items, kept in one JSON file under the data directory. */
export class DatasetCache {
  readonly filePath: string

  constructor(
    dataDir: string,
    private readonly ttlHours: number
  ) {
    this.filePath = path.join(dataDir, 'feedback-cache.json')
  }

  /** The cached items regardless of age, or null when there is no readable cache. */
  async read(now: Date = new Date()): Promise<CachedItems | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    } catch (e) {
      log.debug('no cache file', errorMessage(e))
      return null
    }
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (e) {
      log.warn('ignoring unreadable cache file', errorMessage(e))
      return null
    }
    const parsed = CacheFileSchema.safeParse(json)
    if (!parsed.success) {
      log.warn('ignoring cache file with unexpected shape', parsed.error.issues[0]?.message)
      return null
    }
    const savedAt = new Date(parsed.data.savedAt)
    return { items: parsed.data.items, savedAt, ageHours: (now.getTime() - savedAt.getTime()) / 3_600_000 }
  }

  /** Like `read`, but only while the cache is younger than the TTL. */
  async readFresh(now: Date = new Date()): Promise<CachedItems | null> {
    const cached = await this.read(now)
    if (!cached || cached.ageHours < 0 || cached.ageHours >= this.ttlHours) return null
    return cached
  }

  async write(items: readonly SourceItem[], now: Date = new Date()): Promise<void> {
    const serializable = items.map((item) => (item.kind === 'google_play' && item.at instanceof Date ? { ...item, at: item.at.toISOString() } : item))
    await atomicWrite(this.filePath, JSON.stringify({ savedAt: now.getTime(), items: serializable }))
  }
}
