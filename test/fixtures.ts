import type { AnalyzedRecord, ClassifiedRecord, Priority } from '../src/feedback/types'

let seq = 0

/** A classified record with neutral defaults; override what the test is about. */
export function classified(overrides: Partial<ClassifiedRecord> = {}): ClassifiedRecord {
  seq++
  return {
    id: `r${seq}`,
    source: 'csv',
    text: 'placeholder review',
    date: '2024-01-01T00:00:00.000Z',
    dateInferred: false,
    topics: [],
    sentiment: 'neutral',
    sentimentScore: 0,
    confidence: 50,
    classifiedBy: 'rules',
    ...overrides
  }
}

type AnalyzedOverrides = Partial<ClassifiedRecord> & { priority?: Priority; isFeatureRequest?: boolean }

/** An analyzed record; passing `priority` makes it a bug. */
export function analyzed(overrides: AnalyzedOverrides = {}): AnalyzedRecord {
  const { priority, isFeatureRequest = false, ...rest } = overrides
  const base = classified(rest)
  return priority ? { ...base, isBug: true, priority, isFeatureRequest } : { ...base, isBug: false, isFeatureRequest }
}

/** ISO timestamp `n` days after 2024-01-01 (a Monday), at `hour` UTC. */
export function day(n: number, hour = 12): string {
  return new Date(Date.UTC(2024, 0, 1 + n, hour)).toISOString()
}
