import { AnalysisConfig, defaultAnalysisConfig } from '../analysis/config'
import { bugBoard, featureRequests } from '../analysis/prioritize'
import { extractTopics } from '../analysis/topics'
import { computeTrends, HeadlineTrends, headlineTrends } from '../analysis/trends'
import type { Notice } from '../errors'
import {
  AnalyzedRecord,
  BucketWidth,
  FeedbackFilters,
  Kpis,
  SOURCES,
  SourceShare,
  TopicCount,
  TrendSeries
} from '../feedback/types'
import { applyFilters, rangeBounds } from './filter'

/** Everything the dashboard renders for one set of filters. Holds no clock values. */
export interface InsightSnapshot {
  filters: FeedbackFilters
  kpis: Kpis
  sources: SourceShare[]
  bugs: AnalyzedRecord[]
  features: AnalyzedRecord[]
  topics: TopicCount[]
  trends: TrendSeries
  headline: HeadlineTrends
  notices: Notice[]
}

export interface SnapshotOptions {
  bucket?: BucketWidth
  notices?: Notice[]
  excludeInferredDates?: boolean
  config?: AnalysisConfig
}

const pct = (part: number, total: number) => (total ? Math.round((part / total) * 1000) / 10 : 0)

function avg(values: number[], places: number): number | null {
  if (values.length === 0) return null
  const f = 10 ** places
  return Math.round((values.reduce((a, b) => a + b, 0) / values.length) * f) / f || 0
}

export function computeKpis(records: readonly AnalyzedRecord[]): Kpis {
  const total = records.length
  const count = (pred: (r: AnalyzedRecord) => boolean) => records.filter(pred).length
  const positive = count((r) => r.sentiment === 'positive')
  const negative = count((r) => r.sentiment === 'negative')
  const ratings = records.flatMap((r) => (r.rating === undefined ? [] : [r.rating]))
  return {
    total,
    positive,
    neutral: count((r) => r.sentiment === 'neutral'),
    negative,
    positivePct: pct(positive, total),
    negativePct: pct(negative, total),
    avgScore: avg(records.map((r) => r.sentimentScore), 3),
    avgRating: avg(ratings, 2),
    avgConfidence: avg(records.map((r) => r.confidence), 1),
    bugCount: count((r) => r.isBug),
    featureCount: count((r) => r.isFeatureRequest),
    criticalCount: count((r) => r.priority === 'critical')
  }
}

/** Per-source counts in the canonical source order; sources with no records are omitted. */
export function sourceBreakdown(records: readonly AnalyzedRecord[]): SourceShare[] {
  return SOURCES.map((source) => {
    const count = records.filter((r) => r.source === source).length
    return { source, count, share: pct(count, records.length) }
  }).filter((s) => s.count > 0)
}

/** Pure projection of `records` under `filters`; equal inputs give equal snapshots. */
export function buildSnapshot(
  records: readonly AnalyzedRecord[],
  filters: FeedbackFilters = {},
  opts: SnapshotOptions = {}
): InsightSnapshot {
  const cfg = opts.config ?? defaultAnalysisConfig
  const view = applyFilters(records, filters)
  return {
    filters,
    kpis: computeKpis(view),
    sources: sourceBreakdown(view),
    bugs: bugBoard(view, cfg.snapshot.bugLimit),
    features: featureRequests(view, cfg.snapshot.featureLimit),
    topics: extractTopics(view, cfg.snapshot.topicLimit, cfg),
    trends: computeTrends(view, {
      width: opts.bucket ?? 'day',
      range: rangeBounds(filters.dateRange),
      excludeInferredDates: opts.excludeInferredDates,
      config: cfg
    }),
    headline: headlineTrends(view, cfg),
    notices: opts.notices ?? []
  }
}
