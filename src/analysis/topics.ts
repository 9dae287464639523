import type { FeedbackRecord, TopicCount } from '../feedback/types'
import { AnalysisConfig, defaultAnalysisConfig } from './config'
import { compileLexicon, tokenize } from './lexicon'

/**
 * Candidate topic terms of one text: kept unigrams plus bigrams of adjacent kept tokens,
 * deduplicated, in order of first appearance.
 */
export function topicTerms(text: string, cfg: AnalysisConfig = defaultAnalysisConfig): string[] {
  const { stopwords } = compileLexicon(cfg.lexicon)
  const keep = (t: string) => t.length >= cfg.topics.minLength && !stopwords.has(t) && !/^\d+$/.test(t)
  const tokens = tokenize(text)

  const terms: string[] = []
  for (let i = 0; i < tokens.length; i++) {
    if (!keep(tokens[i])) continue
    terms.push(tokens[i])
    if (i + 1 < tokens.length && keep(tokens[i + 1])) terms.push(`${tokens[i]} ${tokens[i + 1]}`)
  }
  return Array.from(new Set(terms))
}

/**
 * Frequency table of recurring terms, counted once per record that mentions them.
 * Ties keep first-seen order, so repeated calls over the same records agree.
 */
export function extractTopics(
  records: readonly Pick<FeedbackRecord, 'text'>[],
  limit: number = defaultAnalysisConfig.topics.limit,
  cfg: AnalysisConfig = defaultAnalysisConfig
): TopicCount[] {
  const counts = new Map<string, number>()
  for (const r of records) {
    for (const term of topicTerms(r.text, cfg)) counts.set(term, (counts.get(term) ?? 0) + 1)
  }
  // Map iteration is insertion order and Array.prototype.sort is stable
  return Array.from(counts, ([topic, count]) => ({ topic, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit))
}

/** Gives each record the vocabulary terms it mentions, in vocabulary rank order. */
export function tagTopics<T extends FeedbackRecord>(
  records: readonly T[],
  vocabulary: readonly TopicCount[],
  cfg: AnalysisConfig = defaultAnalysisConfig
): T[] {
  const rank = new Map(vocabulary.map((t, i) => [t.topic, i]))
  return records.map((r) => {
    const topics = topicTerms(r.text, cfg)
      .filter((t) => rank.has(t))
      .sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0))
    return { ...r, topics }
  })
}
