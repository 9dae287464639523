export const SOURCES = ['google_play', 'app_store', 'csv', 'synthetic'] as const
export type Source = (typeof SOURCES)[number]

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const
export type Sentiment = (typeof SENTIMENTS)[number]

/** Ordered most to least severe; the index is the rank used by the bug board. */
export const PRIORITIES = ['critical', 'high', 'normal', 'low'] as const
export type Priority = (typeof PRIORITIES)[number]

export type ClassifiedBy = 'ai' | 'rules'

// Source-shaped input items. Each variant mirrors what its fetcher hands over; the
// normalizer owns the mapping to the canonical record.

export interface GooglePlayItem {
  kind: 'google_play'
  reviewId?: string
  content?: string
  score?: number | null
  at?: Date | string | null
  userName?: string
  reviewCreatedVersion?: string | null
}

export interface AppStoreItem {
  kind: 'app_store'
  id?: string
  title?: string
  content?: string
  rating?: number | string | null
  updated?: string
  author?: string
  version?: string
}

export interface CsvRowItem {
  kind: 'csv'
  /** Header-keyed cells exactly as parsed; unknown columns are ignored. */
  row: Record<string, string | undefined>
}

export interface SyntheticItem {
  kind: 'synthetic'
  id: string
  text: string
  rating?: number
  date: string
  author?: string
  version?: string
}

export type SourceItem = GooglePlayItem | AppStoreItem | CsvRowItem | SyntheticItem

export interface FeedbackRecord {
  readonly id: string
  readonly source: Source
  readonly text: string
  readonly title?: string
  /** Integer 1-5 when the source carries a rating. */
  readonly rating?: number
  /** ISO-8601, UTC. */
  readonly date: string
  /** Set when `date` is the ingestion time because the source had none we could read. */
  readonly dateInferred: boolean
  readonly author?: string
  readonly version?: string
  readonly topics: readonly string[]
}

export interface Classification {
  readonly sentiment: Sentiment
  /** [-1, 1] */
  readonly sentimentScore: number
  /** [0, 100] */
  readonly confidence: number
  readonly classifiedBy: ClassifiedBy
}

export type ClassifiedRecord = FeedbackRecord & Classification

/** `priority` exists exactly when the record is a bug. */
export type IssueFlag = { readonly isBug: true; readonly priority: Priority } | { readonly isBug: false; readonly priority?: undefined }

export type AnalyzedRecord = ClassifiedRecord &
  IssueFlag & {
    readonly isFeatureRequest: boolean
  }

export type BucketWidth = 'day' | 'week'
export type Direction = 'up' | 'down' | 'flat'
export const TREND_METRICS = ['count', 'sentiment', 'rating', 'bugCount'] as const
export type TrendMetric = (typeof TREND_METRICS)[number]

export interface TrendPoint {
  periodStart: string
  periodEnd: string
  metric: TrendMetric
  /** `null` for averages over an empty bucket. */
  value: number | null
  delta: number | null
  direction: Direction
}

export interface TrendBucket {
  periodStart: string
  periodEnd: string
  count: number
  avgSentiment: number | null
  avgRating: number | null
  bugCount: number
}

export interface TrendSeries {
  width: BucketWidth
  buckets: TrendBucket[]
  points: Record<TrendMetric, TrendPoint[]>
}

export interface HeadlineTrend {
  direction: Direction
  delta: number | null
}

export interface TopicCount {
  topic: string
  count: number
}

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start?: string
  /** YYYY-MM-DD, inclusive */
  end?: string
}

export interface FeedbackFilters {
  dateRange?: DateRange
  sources?: Source[]
  sentiments?: Sentiment[]
  priorities?: Priority[]
  /** case-insensitive substring of the review text */
  text?: string
}

export interface Kpis {
  total: number
  positive: number
  neutral: number
  negative: number
  positivePct: number
  negativePct: number
  avgScore: number | null
  avgRating: number | null
  avgConfidence: number | null
  bugCount: number
  featureCount: number
  criticalCount: number
}

export interface SourceShare {
  source: Source
  count: number
  /** Percentage of the filtered total, one decimal. */
  share: number
}
