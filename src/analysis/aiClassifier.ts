import { z } from 'zod'
import { err, ok, Result } from '../errors'
import { SENTIMENTS } from '../feedback/types'
import { LLMCaller, parseFencedJSON } from '../llm'
import { scoped } from '../logger'
import { AnalysisConfig, defaultAnalysisConfig } from './config'
import { ClassificationInput, isConsistent, SentimentJudgement } from './sentiment'

const log = scoped('ai-classifier')

const SYSTEM_PROMPT = `You are a product feedback analyst. Judge the sentiment of one customer review.
MUST STRICTLY RESPOND with a JSON code fence only (triple backticks) containing a single JSON object with three keys:
"sentiment" (one of "positive", "neutral", "negative"),
"score" (a number from -1.0 to 1.0; above 0.2 for positive, below -0.2 for negative, between for neutral),
"confidence" (a number from 0.0 to 1.0, how sure you are of the sentiment label).
Do NOT output any other text outside the code fence.`

const JudgementSchema = z.object({
  sentiment: z.preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(SENTIMENTS)),
  score: z.coerce.number().min(-1).max(1),
  confidence: z.coerce.number().min(0).max(100)
})

export interface SentimentClassifier {
  classify(input: ClassificationInput): Promise<Result<SentimentJudgement>>
}

/**
 * Reads a fenced model reply into a judgement. Confidence may come back as a fraction
 * (0-1, scaled to a percentage) or as a percentage already.
 */
export function parseJudgement(fenced: string | undefined, cfg: AnalysisConfig = defaultAnalysisConfig): Result<SentimentJudgement> {
  const raw = parseFencedJSON(fenced)
  if (raw === null) return err('response is not a JSON code fence')
  const parsed = JudgementSchema.safeParse(raw)
  if (!parsed.success) {
    return err(`unexpected shape: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`)
  }
  const { sentiment, score, confidence } = parsed.data
  if (!isConsistent(sentiment, score, cfg)) return err(`sentiment "${sentiment}" contradicts score ${score}`)
  return ok({
    sentiment,
    sentimentScore: Math.round(score * 1000) / 1000 || 0,
    confidence: Math.round(confidence <= 1 ? confidence * 100 : confidence)
  })
}

function userQueryFor(input: ClassificationInput) {
  const lines: string[] = []
  if (input.title) lines.push(`Title: ${input.title}`)
  lines.push(`Review: ${input.text.slice(0, 1200)}`)
  if (input.rating !== undefined) lines.push(`Star rating: ${input.rating}/5`)
  return lines.join('\n')
}

export class AiSentimentClassifier implements SentimentClassifier {
  /** One retry after a malformed reply; transport failures are not retried here. */
  static readonly MAX_ATTEMPTS = 2

  constructor(
    private readonly callLLM: LLMCaller,
    private readonly cfg: AnalysisConfig = defaultAnalysisConfig
  ) {}

  async classify(input: ClassificationInput): Promise<Result<SentimentJudgement>> {
    const query = userQueryFor(input)
    let lastError = ''
    for (let attempt = 1; attempt <= AiSentimentClassifier.MAX_ATTEMPTS; attempt++) {
      const res = await this.callLLM(SYSTEM_PROMPT, query, { json: true, retries: 0 })
      if (!res.success) return err(`provider error: ${res.error ?? 'unknown'}`)
      const judgement = parseJudgement(res.data, this.cfg)
      if (judgement.ok) return judgement
      lastError = judgement.error
      log.debug(`malformed reply (attempt ${attempt})`, lastError)
    }
    return err(`malformed reply after ${AiSentimentClassifier.MAX_ATTEMPTS} attempts: ${lastError}`)
  }
}
