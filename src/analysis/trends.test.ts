import { describe, expect, it } from 'vitest'
import { analyzed, day } from '../../test/fixtures'
import { ContractViolationError } from '../errors'
import { mergeAnalysisConfig } from './config'
import type { AnalyzedRecord } from '../feedback/types'
import { bucketRecords, computeTrends, directionOf, headlineTrends } from './trends'

/** Two records a day for 50 days; days 20-40 are a bad release. */
function dipScenario(): AnalyzedRecord[] {
  const records: AnalyzedRecord[] = []
  for (let d = 0; d < 50; d++) {
    const bad = d >= 20 && d <= 40
    for (let k = 0; k < 2; k++) {
      records.push(
        analyzed({
          date: day(d, 8 + k),
          sentiment: bad ? 'negative' : 'positive',
          sentimentScore: bad ? -0.6 : 0.6,
          rating: bad ? 1 : 5,
          ...(bad && { priority: 'high' as const })
        })
      )
    }
  }
  return records
}

describe('computeTrends', () => {
  it('turns down entering the dip and up leaving it', () => {
    const series = computeTrends(dipScenario(), { width: 'day' })
    expect(series.buckets).toHaveLength(50)
    const sentiment = series.points.sentiment
    expect(sentiment[20]).toMatchObject({ periodStart: '2024-01-21', value: -0.6, delta: -1.2, direction: 'down' })
    expect(sentiment[41]).toMatchObject({ periodStart: '2024-02-11', value: 0.6, delta: 1.2, direction: 'up' })
    expect(sentiment.slice(21, 41).every((p) => p.direction === 'flat')).toBe(true)
    expect(series.points.bugCount[20]).toMatchObject({ value: 2, delta: 2, direction: 'up' })
    expect(series.points.rating[41]).toMatchObject({ value: 5, delta: 4, direction: 'up' })
    expect(series.points.count.every((p) => p.direction === 'flat')).toBe(true)
  })

  it('reports the first bucket as flat with no delta', () => {
    const series = computeTrends(dipScenario())
    for (const points of Object.values(series.points)) {
      expect(points[0]).toMatchObject({ delta: null, direction: 'flat' })
    }
  })

  it('keeps empty buckets with null averages', () => {
    const records = [
      analyzed({ date: day(0), sentimentScore: 0.5, sentiment: 'positive', rating: 4 }),
      analyzed({ date: day(2), sentimentScore: 0.1, rating: 3 })
    ]
    const series = computeTrends(records)
    expect(series.buckets.map((b) => [b.periodStart, b.count, b.avgSentiment])).toEqual([
      ['2024-01-01', 1, 0.5],
      ['2024-01-02', 0, null],
      ['2024-01-03', 1, 0.1]
    ])
    expect(series.points.sentiment.map((p) => p.direction)).toEqual(['flat', 'flat', 'flat'])
    expect(series.points.sentiment.map((p) => p.delta)).toEqual([null, null, null])
    expect(series.points.count.map((p) => p.direction)).toEqual(['flat', 'down', 'up'])
  })

  it('buckets by Monday-based weeks', () => {
    const records = [analyzed({ date: day(2) }), analyzed({ date: day(9) }), analyzed({ date: day(13, 23) })]
    const buckets = bucketRecords(records, { width: 'week' })
    expect(buckets.map((b) => [b.periodStart, b.periodEnd, b.count])).toEqual([
      ['2024-01-01', '2024-01-07', 1],
      ['2024-01-08', '2024-01-14', 2]
    ])
  })

  it('averages ratings over rated records only', () => {
    const buckets = bucketRecords([analyzed({ rating: 5 }), analyzed({}), analyzed({ rating: 2 })])
    expect(buckets[0]).toMatchObject({ count: 3, avgRating: 3.5 })
  })

  it('spans the requested range and can leave out inferred dates', () => {
    const records = [analyzed({ date: day(1) }), analyzed({ date: day(1), dateInferred: true })]
    const buckets = bucketRecords(records, {
      range: { start: Date.parse(day(0)), end: Date.parse(day(3)) },
      excludeInferredDates: true
    })
    expect(buckets.map((b) => b.count)).toEqual([0, 1, 0, 0])
  })

  it('fails loudly on records that skipped the pipeline', () => {
    expect(() => computeTrends([analyzed({ date: 'not a date' })])).toThrow(ContractViolationError)
    expect(() => computeTrends([analyzed({ sentimentScore: Number.NaN })])).toThrow(ContractViolationError)
  })

  it('returns no buckets for no records', () => {
    expect(computeTrends([]).buckets).toEqual([])
  })

  it('handles datasets of a few hundred thousand records', () => {
    const records = Array.from({ length: 200_000 }, (_, i) => analyzed({ id: `r${i}`, date: day(i % 30) }))
    const series = computeTrends(records)
    expect(series.buckets).toHaveLength(30)
    expect(series.buckets.reduce((n, b) => n + b.count, 0)).toBe(200_000)
    expect(headlineTrends(records).sentiment.direction).toBe('flat')
  })

  it('narrows an over-wide range to the span of the records', () => {
    const buckets = bucketRecords([analyzed({ date: day(3) })], {
      range: { start: Date.parse('1000-01-01T00:00:00Z'), end: Date.parse('2999-12-31T00:00:00Z') }
    })
    expect(buckets.map((b) => [b.periodStart, b.count])).toEqual([['2024-01-04', 1]])
  })

  it('keeps the newest buckets when the span is still too wide', () => {
    const config = mergeAnalysisConfig({ trends: { maxBuckets: 5 } })
    const spread = Array.from({ length: 10 }, (_, d) => analyzed({ date: day(d) }))
    expect(bucketRecords(spread, { config }).map((b) => b.periodStart)).toEqual([
      '2024-01-06',
      '2024-01-07',
      '2024-01-08',
      '2024-01-09',
      '2024-01-10'
    ])
    const empty = bucketRecords([], { config, range: { start: Date.parse(day(0)), end: Date.parse(day(9)) } })
    expect(empty.map((b) => b.count)).toEqual([0, 0, 0, 0, 0])
    expect(empty[0].periodStart).toBe('2024-01-06')
  })
})

describe('headlineTrends', () => {
  it('compares the last 15 days with everything before', () => {
    const records = [
      ...[0, 1, 2, 3, 4].map((d) => analyzed({ date: day(d), sentimentScore: -0.5, sentiment: 'negative' })),
      ...[40, 41, 42, 43, 44].map((d) => analyzed({ date: day(d), sentimentScore: 0.5, sentiment: 'positive' }))
    ]
    expect(headlineTrends(records)).toEqual({
      sentiment: { direction: 'up', delta: 1 },
      rating: { direction: 'flat', delta: null },
      bugRate: { direction: 'flat', delta: 0 }
    })
  })

  it('stays flat with too few samples on one side', () => {
    const records = [analyzed({ date: day(0) }), analyzed({ date: day(30) }), analyzed({ date: day(31) }), analyzed({ date: day(32) })]
    expect(headlineTrends(records).sentiment).toEqual({ direction: 'flat', delta: null })
  })
})

describe('directionOf', () => {
  it('applies the dead band', () => {
    expect(directionOf(0.04, 0.05)).toBe('flat')
    expect(directionOf(-0.05, 0.05)).toBe('down')
    expect(directionOf(null, 0.05)).toBe('flat')
  })
})
