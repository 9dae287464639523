import { mergeNotices, notice, Notice } from '../errors'
import { scoped } from '../logger'
import { parseFeedbackDate } from './dates'
import { AppStoreItem, CsvRowItem, FeedbackRecord, GooglePlayItem, Source, SourceItem, SyntheticItem } from './types'

const log = scoped('normalize')

/** Source-neutral intermediate shape; every mapper produces one of these. */
type Draft = {
  source: Source
  id?: string
  text?: string
  title?: string
  rating?: unknown
  date?: unknown
  author?: string
  version?: string
}

export interface NormalizeOptions {
  /** Substituted for missing or unreadable dates. */
  ingestedAt?: Date
}

export interface NormalizeResult {
  records: FeedbackRecord[]
  /** Items dropped for empty text. */
  skipped: number
  /** Items dropped because an earlier item had the same id. */
  duplicates: number
  notices: Notice[]
}

export const CSV_TEXT_COLUMNS = ['text', 'review', 'feedback', 'comment']

const clean = (s: string | null | undefined) => (s ?? '').replace(/\s+/g, ' ').trim()
const optional = (s: string | null | undefined) => clean(s) || undefined

export function parseRating(value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined
  const n = typeof value === 'number' ? value : Number(String(value).trim() || NaN)
  if (!Number.isFinite(n)) return undefined
  const r = Math.round(n)
  return r >= 1 && r <= 5 ? r : undefined
}

const fromGooglePlay = (item: GooglePlayItem): Draft => ({
  source: 'google_play',
  id: optional(item.reviewId),
  text: item.content,
  rating: item.score,
  date: item.at,
  author: optional(item.userName),
  version: optional(item.reviewCreatedVersion)
})

const fromAppStore = (item: AppStoreItem): Draft => ({
  source: 'app_store',
  id: optional(item.id),
  text: item.content,
  title: optional(item.title),
  rating: item.rating,
  date: item.updated,
  author: optional(item.author),
  version: optional(item.version)
})

function fromCsvRow(item: CsvRowItem): Draft {
  // header lookup is case- and whitespace-insensitive
  const cells = new Map<string, string>()
  for (const [key, value] of Object.entries(item.row)) {
    if (value !== undefined) cells.set(key.trim().toLowerCase(), value)
  }
  const pick = (...names: string[]) => names.map((n) => cells.get(n)).find((v) => v !== undefined && clean(v) !== '')
  return {
    source: 'csv',
    id: optional(pick('id')),
    text: pick(...CSV_TEXT_COLUMNS),
    title: optional(pick('title')),
    rating: pick('rating', 'score'),
    date: pick('date'),
    author: optional(pick('author', 'name')),
    version: optional(pick('version'))
  }
}

const fromSynthetic = (item: SyntheticItem): Draft => ({
  source: 'synthetic',
  id: item.id,
  text: item.text,
  rating: item.rating,
  date: item.date,
  author: item.author,
  version: item.version
})

function toDraft(item: SourceItem): Draft {
  switch (item.kind) {
    case 'google_play':
      return fromGooglePlay(item)
    case 'app_store':
      return fromAppStore(item)
    case 'csv':
      return fromCsvRow(item)
    case 'synthetic':
      return fromSynthetic(item)
  }
}

/**
 * Maps one item to a canonical record, or null when it has no usable text.
 * `index` is the item's position in its batch and only feeds generated ids.
 */
export function normalizeItem(item: SourceItem, index: number, ingestedAt: Date = new Date()): FeedbackRecord | null {
  const draft = toDraft(item)
  const text = clean(draft.text)
  if (!text) return null

  const parsed = parseFeedbackDate(draft.date)
  const rating = parseRating(draft.rating)
  const record: FeedbackRecord = {
    id: draft.id ?? `${draft.source}_${index}`,
    source: draft.source,
    text,
    date: (parsed ?? ingestedAt).toISOString(),
    dateInferred: parsed === null,
    topics: [],
    ...(draft.title !== undefined && { title: draft.title }),
    ...(rating !== undefined && { rating }),
    ...(draft.author !== undefined && { author: draft.author }),
    ...(draft.version !== undefined && { version: draft.version })
  }
  return record
}

export function normalizeItems(items: readonly SourceItem[], opts: NormalizeOptions = {}): NormalizeResult {
  const ingestedAt = opts.ingestedAt ?? new Date()
  const seen = new Set<string>()
  const records: FeedbackRecord[] = []
  let skipped = 0
  let duplicates = 0
  let inferred = 0

  items.forEach((item, i) => {
    const record = normalizeItem(item, i, ingestedAt)
    if (!record) {
      skipped++
      return
    }
    if (seen.has(record.id)) {
      duplicates++
      return
    }
    seen.add(record.id)
    if (record.dateInferred) inferred++
    records.push(record)
  })

  if (skipped || duplicates || inferred) {
    log.debug(`normalized ${records.length}/${items.length}`, { skipped, duplicates, inferred })
  }

  return {
    records,
    skipped,
    duplicates,
    notices: mergeNotices([notice('MalformedInput', skipped, `${skipped} feedback item(s) had no text and were skipped`)])
  }
}
