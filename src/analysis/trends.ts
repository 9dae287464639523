import { ContractViolationError } from '../errors'
import { DAY_MS, isoDay, startOfUtcDay, startOfUtcWeek } from '../feedback/dates'
import {
  AnalyzedRecord,
  BucketWidth,
  Direction,
  HeadlineTrend,
  TrendBucket,
  TrendMetric,
  TrendPoint,
  TrendSeries
} from '../feedback/types'
import { AnalysisConfig, defaultAnalysisConfig } from './config'

type TrendRecord = Pick<AnalyzedRecord, 'id' | 'date' | 'dateInferred' | 'sentimentScore' | 'rating' | 'isBug'>

export interface TrendOptions {
  width?: BucketWidth
  /** Epoch ms bounds; default to the first and last record. */
  range?: { start?: number; end?: number }
  /** Leave out records whose date was substituted with the ingestion time. */
  excludeInferredDates?: boolean
  config?: AnalysisConfig
}

const WIDTH_MS: Record<BucketWidth, number> = { day: DAY_MS, week: 7 * DAY_MS }
const ALIGN: Record<BucketWidth, (ms: number) => number> = { day: startOfUtcDay, week: startOfUtcWeek }

const round = (n: number, places: number) => {
  const f = 10 ** places
  return Math.round(n * f) / f || 0
}

const mean = (xs: number[]) => (xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : null)

function span(times: readonly number[]): { min: number; max: number } {
  let min = Infinity
  let max = -Infinity
  for (const t of times) {
    if (t < min) min = t
    if (t > max) max = t
  }
  return { min, max }
}

function timeOf(r: TrendRecord): number {
  const t = Date.parse(r.date)
  if (Number.isNaN(t)) throw new ContractViolationError(`record ${r.id} reached the trend engine without a usable date`)
  if (!Number.isFinite(r.sentimentScore)) {
    throw new ContractViolationError(`record ${r.id} reached the trend engine without a sentiment score`)
  }
  return t
}

export function directionOf(delta: number | null, epsilon: number): Direction {
  if (delta === null || Math.abs(delta) < epsilon) return 'flat'
  return delta > 0 ? 'up' : 'down'
}

/**
 * Partitions records into contiguous UTC buckets. Buckets without records are kept, with
 * zero counts and null averages. A range wider than `maxBuckets` is narrowed to the span of
 * the records, and then to the newest `maxBuckets` buckets.
 */
export function bucketRecords(records: readonly TrendRecord[], opts: TrendOptions = {}): TrendBucket[] {
  const width = opts.width ?? 'day'
  const step = WIDTH_MS[width]
  const align = ALIGN[width]
  const { maxBuckets } = (opts.config ?? defaultAnalysisConfig).trends
  const included = records.filter((r) => !(opts.excludeInferredDates && r.dateInferred))
  const times = included.map(timeOf)
  if (times.length === 0 && (opts.range?.start === undefined || opts.range?.end === undefined)) return []

  const data = span(times)
  let first = align(opts.range?.start ?? data.min)
  let last = align(opts.range?.end ?? data.max)
  const bucketCount = () => Math.floor((last - first) / step) + 1
  if (bucketCount() > maxBuckets && times.length > 0) {
    first = Math.max(first, align(data.min))
    last = Math.min(last, align(data.max))
  }
  if (last < first) return []
  if (bucketCount() > maxBuckets) first = last - (maxBuckets - 1) * step

  const acc: Array<{ scores: number[]; ratings: number[]; bugs: number }> = []
  for (let t = first; t <= last; t += step) acc.push({ scores: [], ratings: [], bugs: 0 })

  included.forEach((r, i) => {
    const idx = Math.floor((align(times[i]) - first) / step)
    if (idx < 0 || idx >= acc.length) return
    const bucket = acc[idx]
    bucket.scores.push(r.sentimentScore)
    if (r.rating !== undefined) bucket.ratings.push(r.rating)
    if (r.isBug) bucket.bugs++
  })

  return acc.map((b, i) => {
    const start = first + i * step
    const avgSentiment = mean(b.scores)
    const avgRating = mean(b.ratings)
    return {
      periodStart: isoDay(new Date(start)),
      periodEnd: isoDay(new Date(start + step - DAY_MS)),
      count: b.scores.length,
      avgSentiment: avgSentiment === null ? null : round(avgSentiment, 3),
      avgRating: avgRating === null ? null : round(avgRating, 2),
      bugCount: b.bugs
    }
  })
}

const metricValue: Record<TrendMetric, (b: TrendBucket) => number | null> = {
  count: (b) => b.count,
  sentiment: (b) => b.avgSentiment,
  rating: (b) => b.avgRating,
  bugCount: (b) => b.bugCount
}

/** Per-metric points; each delta is against the immediately preceding bucket. */
export function trendPoints(buckets: readonly TrendBucket[], metric: TrendMetric, cfg = defaultAnalysisConfig): TrendPoint[] {
  const value = metricValue[metric]
  const epsilon = cfg.trends.deadBand[metric]
  return buckets.map((b, i) => {
    const current = value(b)
    const previous = i > 0 ? value(buckets[i - 1]) : null
    const delta = current !== null && previous !== null ? round(current - previous, 3) : null
    return {
      periodStart: b.periodStart,
      periodEnd: b.periodEnd,
      metric,
      value: current,
      delta,
      direction: directionOf(delta, epsilon)
    }
  })
}

export function computeTrends(records: readonly TrendRecord[], opts: TrendOptions = {}): TrendSeries {
  const cfg = opts.config ?? defaultAnalysisConfig
  const buckets = bucketRecords(records, opts)
  const pointsFor = (metric: TrendMetric) => trendPoints(buckets, metric, cfg)
  return {
    width: opts.width ?? 'day',
    buckets,
    points: {
      count: pointsFor('count'),
      sentiment: pointsFor('sentiment'),
      rating: pointsFor('rating'),
      bugCount: pointsFor('bugCount')
    }
  }
}

export type HeadlineTrends = Record<'sentiment' | 'rating' | 'bugRate', HeadlineTrend>

/**
 * Recent-versus-older comparison for the dashboard arrows: the last `splitDays` before the
 * newest record against everything before that. Anchored on the data, not the clock.
 */
export function headlineTrends(records: readonly TrendRecord[], cfg: AnalysisConfig = defaultAnalysisConfig): HeadlineTrends {
  const { splitDays, minSamples, headlineDeadBand } = cfg.trends
  const flat: HeadlineTrend = { direction: 'flat', delta: null }
  if (records.length === 0) return { sentiment: flat, rating: flat, bugRate: flat }

  const times = records.map(timeOf)
  const split = span(times).max - splitDays * DAY_MS

  const compare = (pick: (r: TrendRecord) => number | undefined): HeadlineTrend => {
    const recent: number[] = []
    const older: number[] = []
    records.forEach((r, i) => {
      const v = pick(r)
      if (v === undefined) return
      ;(times[i] >= split ? recent : older).push(v)
    })
    const a = mean(recent)
    const b = mean(older)
    if (recent.length < minSamples || older.length < minSamples || a === null || b === null) return flat
    const delta = round(a - b, 3)
    return { direction: directionOf(delta, headlineDeadBand), delta }
  }

  return {
    sentiment: compare((r) => r.sentimentScore),
    rating: compare((r) => r.rating),
    bugRate: compare((r) => (r.isBug ? 1 : 0))
  }
}
