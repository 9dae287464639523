import { describe, expect, it } from 'vitest'
import { analyzed, classified, day } from '../../test/fixtures'
import { assessIssue, bugBoard, featureRequests, prioritizeRecords } from './prioritize'
import { classifyByRules } from './sentiment'

const ruled = (text: string, rating?: number) => classified({ text, rating, ...classifyByRules({ text, rating }) })

describe('assessIssue', () => {
  it('marks a 1-star crash report critical', () => {
    expect(assessIssue(ruled('Crashes every time I open it', 1))).toEqual({
      flag: { isBug: true, priority: 'critical' },
      isFeatureRequest: false
    })
  })

  it('marks defect terms at moderate confidence high', () => {
    expect(assessIssue(ruled('Export is broken', 3)).flag).toEqual({ isBug: true, priority: 'high' })
  })

  it('marks a low rating without defect terms normal', () => {
    expect(assessIssue(ruled('Terrible support', 2)).flag).toEqual({ isBug: true, priority: 'normal' })
  })

  it('marks defect terms at low confidence low', () => {
    const record = classified({ text: 'Search is broken', rating: 3, sentiment: 'negative', sentimentScore: -0.5, confidence: 55 })
    expect(assessIssue(record).flag).toEqual({ isBug: true, priority: 'low' })
  })

  it('never flags a non-negative record as a bug', () => {
    const record = classified({ text: 'Update fixed the crash', rating: 1, sentiment: 'positive', sentimentScore: 0.5 })
    expect(assessIssue(record).flag).toEqual({ isBug: false })
  })

  it('tags feature requests unless the record is negative', () => {
    expect(assessIssue(ruled('Please add dark mode')).isFeatureRequest).toBe(true)
    expect(assessIssue(ruled('Would love exports but it crashes constantly, terrible', 1)).isFeatureRequest).toBe(false)
  })
})

describe('prioritizeRecords', () => {
  it('sets a priority exactly on bugs', () => {
    const out = prioritizeRecords([
      ruled('Crashes every time I open it', 1),
      ruled('Great app!', 5),
      ruled('Terrible support', 2),
      ruled('It opened')
    ])
    expect(out.map((r) => [r.isBug, r.priority])).toEqual([
      [true, 'critical'],
      [false, undefined],
      [true, 'normal'],
      [false, undefined]
    ])
  })
})

describe('rankings', () => {
  it('orders the bug board by severity, then newest first', () => {
    const records = [
      analyzed({ id: 'old-high', priority: 'high', date: day(1) }),
      analyzed({ id: 'crit', priority: 'critical', date: day(0) }),
      analyzed({ id: 'new-high', priority: 'high', date: day(5) }),
      analyzed({ id: 'fine' }),
      analyzed({ id: 'low', priority: 'low', date: day(9) })
    ]
    expect(bugBoard(records).map((r) => r.id)).toEqual(['crit', 'new-high', 'old-high', 'low'])
    expect(bugBoard(records, 2).map((r) => r.id)).toEqual(['crit', 'new-high'])
  })

  it('orders feature requests by rating with unrated last', () => {
    const records = [
      analyzed({ id: 'unrated', isFeatureRequest: true, date: day(9) }),
      analyzed({ id: 'four', rating: 4, isFeatureRequest: true, date: day(1) }),
      analyzed({ id: 'five', rating: 5, isFeatureRequest: true, date: day(0) }),
      analyzed({ id: 'four-new', rating: 4, isFeatureRequest: true, date: day(3) }),
      analyzed({ id: 'other', rating: 5 })
    ]
    expect(featureRequests(records).map((r) => r.id)).toEqual(['five', 'four-new', 'four', 'unrated'])
  })
})
