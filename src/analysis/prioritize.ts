import { AnalyzedRecord, ClassifiedRecord, IssueFlag, Priority, PRIORITIES } from '../feedback/types'
import { AnalysisConfig, defaultAnalysisConfig } from './config'
import { compileLexicon, tokenize } from './lexicon'

export interface IssueAssessment {
  flag: IssueFlag
  isFeatureRequest: boolean
}

/**
 * Decides bug status, priority and the feature-request tag for one classified record.
 *
 * A bug is a negative record that either names a defect or carries a low rating.
 * Priority is the first of: critical (crash, data loss, security or sign-in terms, or
 * a strongly negative 1-star), high (defect terms at moderate confidence), normal (the
 * rating rule alone), low.
 */
export function assessIssue(record: ClassifiedRecord, cfg: AnalysisConfig = defaultAnalysisConfig): IssueAssessment {
  const lex = compileLexicon(cfg.lexicon)
  const tokens = tokenize(record.title ? `${record.title} ${record.text}` : record.text)
  const negative = record.sentiment === 'negative'
  const bugTerms = lex.bug.test(tokens)
  const lowRating = record.rating !== undefined && record.rating <= cfg.issues.lowRating

  const isFeatureRequest = !negative && lex.feature.test(tokens)

  if (!negative || !(bugTerms || lowRating)) {
    return { flag: { isBug: false }, isFeatureRequest }
  }

  let priority: Priority
  if (lex.critical.test(tokens) || (record.rating === 1 && record.sentimentScore <= cfg.issues.criticalScore)) {
    priority = 'critical'
  } else if (bugTerms && record.confidence >= cfg.issues.highConfidence) {
    priority = 'high'
  } else if (!bugTerms) {
    priority = 'normal'
  } else {
    priority = 'low'
  }
  return { flag: { isBug: true, priority }, isFeatureRequest }
}

export function prioritizeRecords(records: readonly ClassifiedRecord[], cfg: AnalysisConfig = defaultAnalysisConfig): AnalyzedRecord[] {
  return records.map((r) => {
    const { flag, isFeatureRequest } = assessIssue(r, cfg)
    return { ...r, ...flag, isFeatureRequest }
  })
}

const priorityRank = (p: Priority) => PRIORITIES.indexOf(p)
const timeOf = (r: { date: string }) => Date.parse(r.date)

/** Bug records, most severe first, newest first within a tier. */
export function bugBoard(records: readonly AnalyzedRecord[], limit = Infinity): AnalyzedRecord[] {
  return records
    .filter((r) => r.isBug)
    .sort((a, b) => {
      const byPriority = rank(a) - rank(b)
      return byPriority !== 0 ? byPriority : timeOf(b) - timeOf(a)
    })
    .slice(0, limit)
}

function rank(r: AnalyzedRecord) {
  return r.isBug ? priorityRank(r.priority) : PRIORITIES.length
}

/** Feature requests, highest rating first (unrated last), newest first on ties. */
export function featureRequests(records: readonly AnalyzedRecord[], limit = Infinity): AnalyzedRecord[] {
  return records
    .filter((r) => r.isFeatureRequest)
    .sort((a, b) => {
      const byRating = (b.rating ?? 0) - (a.rating ?? 0)
      return byRating !== 0 ? byRating : timeOf(b) - timeOf(a)
    })
    .slice(0, limit)
}
