export type NoticeKind = 'SourceUnavailable' | 'ClassificationDegraded' | 'MalformedInput' | 'QueryUnanswerable'

/**
 * A recovered degradation. Callers render these as banners ("12 reviews used fallback
 * classification"); none of them stop the pipeline.
 */
export interface Notice {
  kind: NoticeKind
  message: string
  count: number
}

export const notice = (kind: NoticeKind, count: number, message: string): Notice => ({ kind, count, message })

/** Sums notices of the same kind, keeping the first message. */
export function mergeNotices(...lists: Notice[][]): Notice[] {
  const byKind = new Map<NoticeKind, Notice>()
  for (const n of lists.flat()) {
    if (n.count <= 0) continue
    const existing = byKind.get(n.kind)
    if (existing) byKind.set(n.kind, { ...existing, count: existing.count + n.count })
    else byKind.set(n.kind, { ...n })
  }
  return Array.from(byKind.values())
}

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result
}

/** Unwraps `result`, or computes a replacement from the error. */
export function orElse<T, E>(result: Result<T, E>, fallback: (error: E) => T): T {
  return result.ok ? result.value : fallback(result.error)
}

/**
 * Raised when a component receives data that the pipeline should have made impossible,
 * such as an unclassified record reaching the trend engine.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ContractViolationError'
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
