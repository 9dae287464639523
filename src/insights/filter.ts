import { ContractViolationError } from '../errors'
import { DAY_MS, parseIsoDay } from '../feedback/dates'
import type { AnalyzedRecord, DateRange, FeedbackFilters } from '../feedback/types'

function dayStart(day: string): number {
  const t = parseIsoDay(day)
  if (t === null) throw new ContractViolationError(`"${day}" is not a YYYY-MM-DD calendar day`)
  return t
}

/** Epoch-ms bounds of an inclusive whole-day range; `end` covers its full day. */
export function rangeBounds(range: DateRange | undefined): { start?: number; end?: number } {
  return {
    start: range?.start ? dayStart(range.start) : undefined,
    end: range?.end ? dayStart(range.end) + DAY_MS - 1 : undefined
  }
}

function allows<T>(list: readonly T[] | undefined, value: T | undefined): boolean {
  if (!list || list.length === 0) return true
  return value !== undefined && list.includes(value)
}

/**
 * Records matching every given constraint. `text` is a case-insensitive substring match. An absent or empty constraint list matches
 * everything; the input is never modified.
 */
export function applyFilters(records: readonly AnalyzedRecord[], filters: FeedbackFilters = {}): AnalyzedRecord[] {
  const { start, end } = rangeBounds(filters.dateRange)
  const needle = filters.text?.trim().toLowerCase()
  return records.filter((r) => {
    const t = Date.parse(r.date)
    if (start !== undefined && t < start) return false
    if (end !== undefined && t > end) return false
    if (needle && !r.text.toLowerCase().includes(needle)) return false
    return allows(filters.sources, r.source) && allows(filters.sentiments, r.sentiment) && allows(filters.priorities, r.priority)
  })
}
