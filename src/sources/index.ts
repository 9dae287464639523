import { errorMessage, mergeNotices, notice, Notice } from '../errors'
import type { SourceItem } from '../feedback/types'
import { scoped } from '../logger'
import type { DatasetCache } from './cache'
import { csvItems, loadCsvFromFile, loadCsvFromText } from './csvSource'
import { generateSyntheticItems, SyntheticOptions } from './synthetic'

const log = scoped('sources')

/**
 * Anything that can hand over feedback items. Store fetchers (Google Play scraping,
 * App Store RSS) plug in here; only file and generated sources ship with the engine.
 */
export interface FeedbackSource {
  readonly name: string
  fetch(): Promise<SourceItem[]>
}

export const csvFileSource = (filePath: string): FeedbackSource => ({
  name: `csv:${filePath}`,
  fetch: async () => csvItems(await loadCsvFromFile(filePath))
})

export const csvTextSource = (name: string, text: string | Buffer): FeedbackSource => ({
  name: `csv:${name}`,
  fetch: async () => csvItems(await loadCsvFromText(text))
})

export const syntheticSource = (opts: SyntheticOptions = {}): FeedbackSource => ({
  name: 'synthetic',
  fetch: async () => generateSyntheticItems(opts)
})

export interface CollectOptions {
  cache?: DatasetCache
  /** Skip a fresh cache and fetch anyway. */
  refresh?: boolean
  /** Used when every source fails and no cache exists. */
  fallback?: () => SourceItem[]
  now?: Date
}

export interface CollectResult {
  items: SourceItem[]
  notices: Notice[]
  origin: 'live' | 'cache' | 'fallback'
}

/**
 * Fetches every source in turn. A failing source is skipped and reported as
 * `SourceUnavailable`; when nothing could be fetched the last cached items, or the
 * fallback generator, stand in.
 */
export async function collectFeedback(sources: readonly FeedbackSource[], opts: CollectOptions = {}): Promise<CollectResult> {
  const now = opts.now ?? new Date()
  if (opts.cache && !opts.refresh) {
    const fresh = await opts.cache.readFresh(now)
    if (fresh) {
      log.info(`cache hit (${fresh.ageHours.toFixed(1)}h old, ${fresh.items.length} items)`)
      return { items: fresh.items, notices: [], origin: 'cache' }
    }
  }

  const items: SourceItem[] = []
  const failures: Notice[] = []
  for (const source of sources) {
    try {
      const fetched = await source.fetch()
      log.info(`${source.name}: ${fetched.length} items`)
      items.push(...fetched)
    } catch (e) {
      log.warn(`${source.name} unavailable:`, errorMessage(e))
      failures.push(notice('SourceUnavailable', 1, `${source.name} unavailable: ${errorMessage(e)}`))
    }
  }

  if (items.length > 0 || failures.length === 0) {
    if (opts.cache && items.length > 0) await opts.cache.write(items, now)
    return { items, notices: mergeNotices(failures), origin: 'live' }
  }

  const stale = opts.cache ? await opts.cache.read(now) : null
  if (stale) {
    log.warn(`all sources failed, using cached items from ${stale.savedAt.toISOString()}`)
    return { items: stale.items, notices: mergeNotices(failures), origin: 'cache' }
  }
  const fallback = opts.fallback ?? (() => generateSyntheticItems({ now }))
  log.warn('all sources failed, using generated sample data')
  return { items: fallback(), notices: mergeNotices(failures), origin: 'fallback' }
}
