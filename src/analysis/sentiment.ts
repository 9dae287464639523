import type { Sentiment } from '../feedback/types'
import { AnalysisConfig, defaultAnalysisConfig } from './config'
import { compileLexicon, tokenize } from './lexicon'

export interface ClassificationInput {
  text: string
  title?: string
  /** 1-5, used as a prior when present */
  rating?: number
}

export interface SentimentJudgement {
  sentiment: Sentiment
  sentimentScore: number
  confidence: number
}

export type LexiconHits = {
  positive: number
  negative: number
}

const round3 = (n: number) => Math.round(n * 1000) / 1000 || 0
const clamp = (n: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, n))

export function sentimentFor(score: number, cfg: AnalysisConfig = defaultAnalysisConfig): Sentiment {
  if (score > cfg.sentiment.positiveThreshold) return 'positive'
  if (score < cfg.sentiment.negativeThreshold) return 'negative'
  return 'neutral'
}

/** Whether a (sentiment, score) pair respects the threshold bands. */
export function isConsistent(sentiment: Sentiment, score: number, cfg: AnalysisConfig = defaultAnalysisConfig) {
  return sentimentFor(score, cfg) === sentiment
}

/** Counts positive and negative lexicon hits; a negated single-word term counts for the other side. */
export function countSentimentHits(tokens: readonly string[], cfg: AnalysisConfig = defaultAnalysisConfig): LexiconHits {
  const lex = compileLexicon(cfg.lexicon)
  const hits: LexiconHits = { positive: 0, negative: 0 }
  const negated = (index: number, length: number) => length === 1 && index > 0 && lex.negators.has(tokens[index - 1])

  for (const m of lex.positive.matches(tokens)) {
    if (negated(m.index, m.length)) hits.negative++
    else hits.positive++
  }
  for (const m of lex.negative.matches(tokens)) {
    if (negated(m.index, m.length)) hits.positive++
    else hits.negative++
  }
  return hits
}

/**
 * Deterministic lexicon classifier used whenever the AI path is unavailable or fails.
 *
 * score = (pos - neg) / (pos + neg), blended with the star rating when one is given;
 * no hits at all is neutral at a fixed confidence. Confidence grows with the number of
 * agreeing hits and never exceeds `fallback.confidenceCeiling`.
 */
export function classifyByRules(input: ClassificationInput, cfg: AnalysisConfig = defaultAnalysisConfig): SentimentJudgement {
  const tokens = tokenize(input.title ? `${input.title} ${input.text}` : input.text)
  const { positive, negative } = countSentimentHits(tokens, cfg)
  const hits = positive + negative
  const f = cfg.fallback

  if (hits === 0) {
    return { sentiment: 'neutral', sentimentScore: 0, confidence: f.noHitConfidence }
  }

  const lexical = (positive - negative) / hits
  const prior = input.rating !== undefined ? clamp((input.rating - 3) / 2, -1, 1) : undefined
  const blended = prior === undefined ? lexical : lexical * (1 - f.ratingWeight) + prior * f.ratingWeight
  const score = round3(clamp(blended, -1, 1))
  const confidence = Math.min(f.confidenceCeiling, Math.round(f.baseConfidence + f.confidencePerHit * hits * Math.abs(lexical)))

  return { sentiment: sentimentFor(score, cfg), sentimentScore: score, confidence }
}
