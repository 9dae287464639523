import { DAY_MS, isoDay, startOfUtcDay } from '../feedback/dates'
import type { SyntheticItem } from '../feedback/types'
import templates from './synthetic-templates.json'

type Kind = 'positive' | 'neutral' | 'negative' | 'feature'

export interface SyntheticOptions {
  count?: number
  /** Items are spread over this many days before `now`. */
  days?: number
  appName?: string
  seed?: number
  now?: Date
}

/** Small deterministic PRNG (mulberry32); the same seed yields the same dataset. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

const RATINGS: Record<Kind, Array<[number, number]>> = {
  positive: [
    [4, 30],
    [5, 70]
  ],
  neutral: [
    [2, 20],
    [3, 60],
    [4, 20]
  ],
  negative: [
    [1, 70],
    [2, 30]
  ],
  feature: [
    [3, 40],
    [4, 60]
  ]
}

/**
 * Plausible app-store feedback with a built-in story: a bad release between 20 and 40
 * days ago pushes 40% of its reviews negative, and the last 10 days recover slightly.
 */
export function generateSyntheticItems(opts: SyntheticOptions = {}): SyntheticItem[] {
  const count = opts.count ?? 200
  const days = opts.days ?? 60
  const app = opts.appName ?? 'MyApp'
  const rand = seededRandom(opts.seed ?? 42)
  const today = startOfUtcDay((opts.now ?? new Date()).getTime())

  const pick = <T>(xs: readonly T[]): T => xs[Math.floor(rand() * xs.length)]
  const int = (lo: number, hi: number) => lo + Math.floor(rand() * (hi - lo + 1))
  const weighted = (pairs: Array<[number, number]>) => {
    const total = pairs.reduce((s, [, w]) => s + w, 0)
    let r = rand() * total
    for (const [value, w] of pairs) {
      r -= w
      if (r < 0) return value
    }
    return pairs[pairs.length - 1][0]
  }

  const versions = Array.from({ length: 8 }, () => `2.${int(18, 25)}.${int(0, 9)}`)
  const authors = Array.from({ length: 40 }, () => `User_${int(1000, 9999)}`)

  const items: SyntheticItem[] = []
  for (let i = 0; i < count; i++) {
    const r = rand()
    let kind: Kind = r < 0.4 ? 'positive' : r < 0.65 ? 'neutral' : r < 0.9 ? 'negative' : 'feature'
    const dayOffset = int(0, days)
    if (dayOffset >= 20 && dayOffset <= 40) {
      if (rand() < 0.4) kind = 'negative'
    } else if (dayOffset < 10 && kind === 'negative' && rand() < 0.3) {
      kind = 'neutral'
    }

    const version = pick(versions)
    const text = pick(templates[kind])
      .replace(/\{app\}/g, app)
      .replace(/\{feature\}/g, pick(templates.features))
      .replace(/\{version\}/g, version)

    items.push({
      kind: 'synthetic',
      id: `synth_${i}`,
      text,
      rating: weighted(RATINGS[kind]),
      date: isoDay(new Date(today - dayOffset * DAY_MS)),
      author: pick(authors),
      version
    })
  }
  return items
}
