import type { TrendMetric } from '../feedback/types'
import { defaultLexicon, Lexicon } from './lexicon'

export interface AnalysisConfig {
  lexicon: Lexicon
  sentiment: {
    /** score above this is positive */
    positiveThreshold: number
    /** score below this is negative */
    negativeThreshold: number
  }
  fallback: {
    /** confidence reported when the text has no lexicon hits */
    noHitConfidence: number
    baseConfidence: number
    confidencePerHit: number
    /** kept below what the AI path reports so callers can tell the two apart */
    confidenceCeiling: number
    /** share of the score taken from the star rating, when there is one */
    ratingWeight: number
  }
  issues: {
    /** ratings at or below this flag a negative record as a bug */
    lowRating: number
    /** a 1-star record at or below this score is critical */
    criticalScore: number
    /** bug indicators at or above this confidence are high priority */
    highConfidence: number
  }
  topics: {
    limit: number
    vocabularySize: number
    minLength: number
  }
  trends: {
    deadBand: Record<TrendMetric, number>
    /** headline trends compare the last `splitDays` against everything older */
    splitDays: number
    minSamples: number
    headlineDeadBand: number
    /** upper bound on buckets per trend series */
    maxBuckets: number
  }
  snapshot: {
    bugLimit: number
    featureLimit: number
    topicLimit: number
  }
}

export const defaultAnalysisConfig: AnalysisConfig = {
  lexicon: defaultLexicon,
  sentiment: {
    positiveThreshold: 0.2,
    negativeThreshold: -0.2
  },
  fallback: {
    noHitConfidence: 50,
    baseConfidence: 50,
    confidencePerHit: 10,
    confidenceCeiling: 80,
    ratingWeight: 0.25
  },
  issues: {
    lowRating: 2,
    criticalScore: -0.5,
    highConfidence: 60
  },
  topics: {
    limit: 8,
    vocabularySize: 20,
    minLength: 3
  },
  trends: {
    deadBand: { count: 1, bugCount: 1, sentiment: 0.05, rating: 0.1 },
    splitDays: 15,
    minSamples: 3,
    headlineDeadBand: 0.05,
    maxBuckets: 1000
  },
  snapshot: {
    bugLimit: 8,
    featureLimit: 6,
    topicLimit: 8
  }
}

export type AnalysisOverrides = {
  [K in keyof AnalysisConfig]?: Partial<AnalysisConfig[K]>
}

export function mergeAnalysisConfig(partial?: AnalysisOverrides): AnalysisConfig {
  if (!partial) return defaultAnalysisConfig
  const d = defaultAnalysisConfig
  return {
    lexicon: { ...d.lexicon, ...partial.lexicon },
    sentiment: { ...d.sentiment, ...partial.sentiment },
    fallback: { ...d.fallback, ...partial.fallback },
    issues: { ...d.issues, ...partial.issues },
    topics: { ...d.topics, ...partial.topics },
    trends: {
      ...d.trends,
      ...partial.trends,
      deadBand: { ...d.trends.deadBand, ...partial.trends?.deadBand }
    },
    snapshot: { ...d.snapshot, ...partial.snapshot }
  }
}
