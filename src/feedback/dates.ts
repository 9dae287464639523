const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

export const DAY_MS = 86_400_000

function utcDate(year: number, month: number, day: number): Date | null {
  const d = new Date(Date.UTC(year, month - 1, day))
  // rejects 2024-02-31 and friends instead of rolling over
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null
  return d
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1
}

function fromEpoch(n: number): Date | null {
  if (!Number.isFinite(n) || n <= 0) return null
  // anything below 1e11 reads as seconds (that is before 1973 in milliseconds)
  const d = new Date(n < 1e11 ? n * 1000 : n)
  return Number.isNaN(d.getTime()) ? null : d
}

/**
 * Reads the date formats feedback sources actually emit. Date-only values are taken as UTC
 * midnight; date-times without an offset are taken as UTC. Returns null when nothing fits.
 */
export function parseFeedbackDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
  if (typeof value === 'number') return fromEpoch(value)
  if (typeof value !== 'string') return null

  const s = value.trim()
  if (!s) return null

  let m: RegExpMatchArray | null
  if (/^\d{9,13}$/.test(s)) return fromEpoch(Number(s))
  if ((m = s.match(/^(\d{4})-(\d{2})-(\d{2})$/))) return utcDate(+m[1], +m[2], +m[3])
  if (/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(s)) {
    const iso = s.replace(' ', 'T')
    const withZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(iso) ? iso : `${iso}Z`
    const t = Date.parse(withZone)
    return Number.isNaN(t) ? null : new Date(t)
  }
  if ((m = s.match(/^(\d{4})\/(\d{1,2})\/(\d{1,2})$/))) return utcDate(+m[1], +m[2], +m[3])
  if ((m = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/))) return utcDate(+m[3], +m[1], +m[2])
  if ((m = s.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/))) return utcDate(+m[3], +m[2], +m[1])
  if ((m = s.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/))) {
    const month = monthIndex(m[1])
    return month ? utcDate(+m[3], month, +m[2]) : null
  }
  if ((m = s.match(/^(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/))) {
    const month = monthIndex(m[2])
    return month ? utcDate(+m[3], month, +m[1]) : null
  }
  return null
}

/** Epoch ms of midnight UTC for a strict `YYYY-MM-DD` calendar day, or null. */
export function parseIsoDay(value: string): number | null {
  const m = value.match(/^(\d{4})-(\d{2})-(\d{2})$/)
  return m ? (utcDate(+m[1], +m[2], +m[3])?.getTime() ?? null) : null
}

/** YYYY-MM-DD of the UTC calendar day. */
export const isoDay = (d: Date): string => d.toISOString().slice(0, 10)

export function startOfUtcDay(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS
}

/** Monday 00:00 UTC of the ISO week containing `ms`. */
export function startOfUtcWeek(ms: number): number {
  const day = startOfUtcDay(ms)
  const weekday = (new Date(day).getUTCDay() + 6) % 7 // Monday = 0
  return day - weekday * DAY_MS
}
