import { err, errorMessage, mapResult, mergeNotices, notice, Notice, orElse, Result } from '../errors'
import type { ClassifiedBy, ClassifiedRecord, FeedbackRecord } from '../feedback/types'
import { scoped } from '../logger'
import type { SentimentClassifier } from './aiClassifier'
import { AnalysisConfig, defaultAnalysisConfig } from './config'
import { classifyByRules, ClassificationInput, SentimentJudgement } from './sentiment'

const log = scoped('classify')

export interface ClassifyOptions {
  /** Omitted when no AI credential is configured: every record takes the rule path. */
  ai?: SentimentClassifier
  /** Upper bound on AI calls in flight. */
  concurrency?: number
  config?: AnalysisConfig
}

export interface ClassifyResult {
  /** Same order as the input. */
  records: ClassifiedRecord[]
  /** Records that were meant for the AI path but ended up on the rules. */
  degraded: number
  notices: Notice[]
}

type Outcome = SentimentJudgement & { classifiedBy: ClassifiedBy; degraded: boolean }

const inputOf = (r: FeedbackRecord): ClassificationInput => ({ text: r.text, title: r.title, rating: r.rating })

/**
 * Classifies one record: the AI judgement when it succeeds, otherwise the lexicon
 * fallback. Never rejects.
 */
export async function classifyWithFallback(
  input: ClassificationInput,
  ai: SentimentClassifier | undefined,
  cfg: AnalysisConfig = defaultAnalysisConfig
): Promise<Outcome> {
  const rules = (): Outcome => ({ ...classifyByRules(input, cfg), classifiedBy: 'rules', degraded: false })
  if (!ai) return rules()

  let result: Result<SentimentJudgement>
  try {
    result = await ai.classify(input)
  } catch (e) {
    // a classifier that throws is treated like any other failed attempt
    result = err(errorMessage(e))
  }
  return orElse(
    mapResult(result, (j): Outcome => ({ ...j, classifiedBy: 'ai', degraded: false })),
    (reason) => {
      log.debug('falling back to rules', reason)
      return { ...rules(), degraded: true }
    }
  )
}

export async function classifyRecords(records: readonly FeedbackRecord[], opts: ClassifyOptions = {}): Promise<ClassifyResult> {
  const cfg = opts.config ?? defaultAnalysisConfig
  const batchSize = Math.max(1, opts.concurrency ?? 4)
  const out: ClassifiedRecord[] = []
  let degraded = 0

  // independent records; slices keep at most `batchSize` provider calls in flight
  for (let i = 0; i < records.length; i += batchSize) {
    const slice = records.slice(i, i + batchSize)
    const outcomes = await Promise.all(slice.map((r) => classifyWithFallback(inputOf(r), opts.ai, cfg)))
    slice.forEach((record, k) => {
      const { degraded: fellBack, ...judgement } = outcomes[k]
      if (fellBack) degraded++
      out.push({ ...record, ...judgement })
    })
  }

  if (degraded) log.warn(`${degraded} of ${records.length} record(s) used fallback classification`)

  return {
    records: out,
    degraded,
    notices: mergeNotices([
      notice('ClassificationDegraded', degraded, `${degraded} review(s) used fallback classification`)
    ])
  }
}
