import { describe, expect, it } from 'vitest'
import { analyzed, day } from '../../test/fixtures'
import { SOURCES } from '../feedback/types'
import { ContractViolationError } from '../errors'
import { applyFilters, rangeBounds } from './filter'

const records = [
  analyzed({ id: 'a', source: 'google_play', sentiment: 'positive', sentimentScore: 0.8, date: day(0), text: 'Offline Sync is great' }),
  analyzed({ id: 'b', source: 'app_store', sentiment: 'negative', sentimentScore: -0.8, priority: 'critical', date: day(1) }),
  analyzed({ id: 'c', source: 'csv', sentiment: 'negative', sentimentScore: -0.4, priority: 'low', date: day(2, 23) }),
  analyzed({ id: 'd', source: 'csv', date: day(3) })
]

const ids = (rs: { id: string }[]) => rs.map((r) => r.id)

describe('applyFilters', () => {
  it('treats absent and empty lists as no constraint', () => {
    expect(ids(applyFilters(records))).toEqual(['a', 'b', 'c', 'd'])
    expect(ids(applyFilters(records, { sources: [], sentiments: [], priorities: [] }))).toEqual(['a', 'b', 'c', 'd'])
  })

  it('intersects every constraint', () => {
    expect(ids(applyFilters(records, { sources: ['csv', 'app_store'], sentiments: ['negative'] }))).toEqual(['b', 'c'])
    expect(ids(applyFilters(records, { sources: ['csv'], priorities: ['critical'] }))).toEqual([])
  })

  it('leaves out non-bugs once a priority is requested', () => {
    expect(ids(applyFilters(records, { priorities: ['low', 'critical'] }))).toEqual(['b', 'c'])
  })

  it('includes whole days at both ends of the date range', () => {
    expect(ids(applyFilters(records, { dateRange: { start: '2024-01-02', end: '2024-01-03' } }))).toEqual(['b', 'c'])
    expect(ids(applyFilters(records, { dateRange: { start: '2024-01-04' } }))).toEqual(['d'])
  })

  it('matches review text case-insensitively', () => {
    expect(ids(applyFilters(records, { text: 'SYNC' }))).toEqual(['a'])
    expect(ids(applyFilters(records, { text: '  offline sync ', sources: ['csv'] }))).toEqual([])
    expect(ids(applyFilters(records, { text: '   ' }))).toEqual(['a', 'b', 'c', 'd'])
  })

  it('rejects days that do not exist', () => {
    expect(rangeBounds({ start: '2024-02-29', end: '2024-02-29' })).toEqual({
      start: Date.parse('2024-02-29T00:00:00Z'),
      end: Date.parse('2024-03-01T00:00:00Z') - 1
    })
    expect(() => rangeBounds({ start: '2024-02-31' })).toThrow(ContractViolationError)
    expect(() => applyFilters(records, { dateRange: { end: '2023-02-29' } })).toThrow(ContractViolationError)
  })

  it('does not modify its input and partitions cleanly by source', () => {
    const before = JSON.stringify(records)
    const perSource = SOURCES.map((s) => applyFilters(records, { sources: [s] }).length)
    expect(perSource.reduce((a, b) => a + b, 0)).toBe(records.length)
    expect(applyFilters(records, { sources: ['csv'] })).toEqual(applyFilters(records, { sources: ['csv'] }))
    expect(JSON.stringify(records)).toBe(before)
  })
})
