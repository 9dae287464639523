import { describe, expect, it } from 'vitest'
import { DAY_MS } from '../feedback/dates'
import { generateSyntheticItems, seededRandom } from './synthetic'

const now = new Date('2024-06-30T15:00:00Z')

describe('seededRandom', () => {
  it('repeats for the same seed and stays in [0, 1)', () => {
    const a = seededRandom(7)
    const b = seededRandom(7)
    for (let i = 0; i < 100; i++) {
      const x = a()
      expect(x).toBe(b())
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(1)
    }
  })
})

describe('generateSyntheticItems', () => {
  it('is deterministic for a seed and clock', () => {
    expect(generateSyntheticItems({ count: 50, now })).toEqual(generateSyntheticItems({ count: 50, now }))
    expect(generateSyntheticItems({ count: 50, now, seed: 1 })).not.toEqual(generateSyntheticItems({ count: 50, now, seed: 2 }))
  })

  it('produces well-formed items inside the requested window', () => {
    const items = generateSyntheticItems({ count: 120, days: 30, appName: 'Notely', now })
    const oldest = Date.parse('2024-05-31T00:00:00Z')
    expect(new Set(items.map((i) => i.id)).size).toBe(120)
    for (const item of items) {
      expect(item.kind).toBe('synthetic')
      expect(item.text).not.toMatch(/\{(app|feature|version)\}/)
      expect(item.rating).toBeGreaterThanOrEqual(1)
      expect(item.rating).toBeLessThanOrEqual(5)
      const t = Date.parse(item.date)
      expect(t).toBeGreaterThanOrEqual(oldest)
      expect(t).toBeLessThanOrEqual(oldest + 30 * DAY_MS)
    }
  })

  it('includes a low-rated stretch between 20 and 40 days ago', () => {
    const items = generateSyntheticItems({ count: 400, days: 60, now })
    const today = Date.parse('2024-06-30T00:00:00Z')
    const lowShare = (inWindow: boolean) => {
      const picked = items.filter((i) => {
        const age = (today - Date.parse(i.date)) / DAY_MS
        return (age >= 20 && age <= 40) === inWindow
      })
      return picked.filter((i) => (i.rating ?? 5) <= 2).length / picked.length
    }
    expect(lowShare(true)).toBeGreaterThan(lowShare(false))
  })
})
