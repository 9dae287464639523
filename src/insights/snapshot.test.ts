import { describe, expect, it } from 'vitest'
import { analyzed, day } from '../../test/fixtures'
import { notice } from '../errors'
import { buildSnapshot, computeKpis, sourceBreakdown } from './snapshot'

const records = [
  analyzed({ id: 'p1', source: 'google_play', sentiment: 'positive', sentimentScore: 0.8, confidence: 70, rating: 5, date: day(0), text: 'Love the sync' }),
  analyzed({ id: 'p2', source: 'google_play', sentiment: 'positive', sentimentScore: 0.6, confidence: 60, rating: 4, date: day(1), isFeatureRequest: true, text: 'Would love sync widgets' }),
  analyzed({ id: 'n1', source: 'app_store', sentiment: 'negative', sentimentScore: -0.9, confidence: 80, rating: 1, date: day(1), priority: 'critical', text: 'Sync crashes' }),
  analyzed({ id: 'u1', source: 'csv', sentiment: 'neutral', sentimentScore: 0, confidence: 50, date: day(2), text: 'Okay overall' })
]

describe('computeKpis', () => {
  it('counts and averages the selection', () => {
    expect(computeKpis(records)).toEqual({
      total: 4,
      positive: 2,
      neutral: 1,
      negative: 1,
      positivePct: 50,
      negativePct: 25,
      avgScore: 0.125,
      avgRating: 3.33,
      avgConfidence: 65,
      bugCount: 1,
      featureCount: 1,
      criticalCount: 1
    })
  })

  it('has null averages for an empty selection', () => {
    expect(computeKpis([])).toMatchObject({ total: 0, positivePct: 0, avgScore: null, avgRating: null, avgConfidence: null })
  })
})

describe('sourceBreakdown', () => {
  it('lists present sources with their share', () => {
    expect(sourceBreakdown(records)).toEqual([
      { source: 'google_play', count: 2, share: 50 },
      { source: 'app_store', count: 1, share: 25 },
      { source: 'csv', count: 1, share: 25 }
    ])
  })
})

describe('buildSnapshot', () => {
  it('projects the filtered records', () => {
    const snap = buildSnapshot(records, { sources: ['google_play', 'app_store'] }, { notices: [notice('ClassificationDegraded', 2, '2 review(s) used fallback classification')] })
    expect(snap.kpis.total).toBe(3)
    expect(snap.bugs.map((r) => r.id)).toEqual(['n1'])
    expect(snap.features.map((r) => r.id)).toEqual(['p2'])
    expect(snap.topics[0]).toEqual({ topic: 'sync', count: 3 })
    expect(snap.trends.buckets.map((b) => b.count)).toEqual([1, 2])
    expect(snap.notices).toHaveLength(1)
  })

  it('is a pure function of records and filters', () => {
    const filters = { sentiments: ['positive' as const] }
    expect(buildSnapshot(records, filters)).toEqual(buildSnapshot(records, filters))
  })

  it('spans the filter date range in the trend series', () => {
    const snap = buildSnapshot(records, { dateRange: { start: '2024-01-01', end: '2024-01-05' } })
    expect(snap.trends.buckets).toHaveLength(5)
  })

  it('does not build a bucket per day of a centuries-wide filter', () => {
    const snap = buildSnapshot([analyzed({ id: 'only', date: day(0) })], { dateRange: { start: '1000-01-01', end: '2999-12-31' } })
    expect(snap.trends.buckets.map((b) => [b.periodStart, b.count])).toEqual([['2024-01-01', 1]])
  })
})
