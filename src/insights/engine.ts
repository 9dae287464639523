import { AiSentimentClassifier, SentimentClassifier } from '../analysis/aiClassifier'
import { classifyRecords } from '../analysis/classify'
import { AnalysisConfig, AnalysisOverrides, mergeAnalysisConfig } from '../analysis/config'
import { prioritizeRecords } from '../analysis/prioritize'
import { extractTopics, tagTopics } from '../analysis/topics'
import type { FeedbackConfig } from '../config'
import { mergeNotices, Notice } from '../errors'
import { normalizeItems } from '../feedback/normalize'
import type { AnalyzedRecord, BucketWidth, FeedbackFilters, SourceItem, TopicCount } from '../feedback/types'
import { createLLMCaller, LLMCaller } from '../llm'
import { scoped } from '../logger'
import type { DatasetCache } from '../sources/cache'
import { collectFeedback, FeedbackSource, syntheticSource } from '../sources'
import type { SyntheticOptions } from '../sources/synthetic'
import { applyFilters } from './filter'
import { buildReportData, exportReport, ReportData, ReportPaths } from './report'
import { buildSnapshot, InsightSnapshot } from './snapshot'
import { Answer, createSummarizer, Summarizer } from './summarizer'

const log = scoped('engine')

export interface AnalyzeOptions {
  ai?: SentimentClassifier
  concurrency?: number
  config?: AnalysisConfig
  ingestedAt?: Date
}

export interface AnalysisStats {
  input: number
  skipped: number
  duplicates: number
  degraded: number
}

export interface AnalysisResult {
  records: AnalyzedRecord[]
  /** Wider topic table the records were tagged from. */
  vocabulary: TopicCount[]
  notices: Notice[]
  stats: AnalysisStats
}

/** Raw items to analyzed records: normalize, classify, tag topics, prioritize. */
export async function analyzeFeedback(items: readonly SourceItem[], opts: AnalyzeOptions = {}): Promise<AnalysisResult> {
  const cfg = opts.config ?? mergeAnalysisConfig()
  // 1. Normalize
  const normalized = normalizeItems(items, { ingestedAt: opts.ingestedAt })
  // 2. Classify
  const classified = await classifyRecords(normalized.records, { ai: opts.ai, concurrency: opts.concurrency, config: cfg })
  // 3. Topics
  const vocabulary = extractTopics(classified.records, cfg.topics.vocabularySize, cfg)
  const tagged = tagTopics(classified.records, vocabulary, cfg)
  // 4. Prioritize
  const records = prioritizeRecords(tagged, cfg)

  return {
    records,
    vocabulary,
    notices: mergeNotices(normalized.notices, classified.notices),
    stats: {
      input: items.length,
      skipped: normalized.skipped,
      duplicates: normalized.duplicates,
      degraded: classified.degraded
    }
  }
}

export type DatasetOrigin = 'live' | 'cache' | 'fallback' | 'synthetic' | 'upload'

/** One loaded dataset. Never mutated; a reload swaps in a new one. */
export interface Dataset {
  readonly records: readonly AnalyzedRecord[]
  readonly notices: readonly Notice[]
  readonly stats: Readonly<AnalysisStats>
  readonly origin: DatasetOrigin
  readonly loadedAt: string
}

export interface EngineOptions {
  config: FeedbackConfig
  analysis?: AnalysisOverrides
  /** Defaults to a client for the configured endpoint when AI is enabled. */
  callLLM?: LLMCaller
  summarizer?: Summarizer
  cache?: DatasetCache
  clock?: () => Date
}

const EMPTY: Dataset = Object.freeze({
  records: Object.freeze([]),
  notices: Object.freeze([]),
  stats: Object.freeze({ input: 0, skipped: 0, duplicates: 0, degraded: 0 }),
  origin: 'live',
  loadedAt: new Date(0).toISOString()
})

function freezeDataset(records: AnalyzedRecord[], rest: Omit<Dataset, 'records'>): Dataset {
  for (const r of records) Object.freeze(r)
  return Object.freeze({ ...rest, records: Object.freeze(records) })
}

/**
 * Holds the session's dataset and answers every read from it. Loads build a complete new
 * dataset before replacing the reference, so a snapshot taken earlier stays consistent.
 */
export class FeedbackInsightEngine {
  private dataset: Dataset = EMPTY
  private loadSeq = 0
  private readonly analysis: AnalysisConfig
  private readonly ai?: SentimentClassifier
  private readonly summarizer: Summarizer
  private readonly clock: () => Date

  constructor(private readonly opts: EngineOptions) {
    this.analysis = mergeAnalysisConfig(opts.analysis)
    const callLLM = opts.callLLM ?? (opts.config.ai.enabled ? createLLMCaller(opts.config.ai) : undefined)
    this.ai = callLLM ? new AiSentimentClassifier(callLLM, this.analysis) : undefined
    this.summarizer = opts.summarizer ?? createSummarizer(callLLM)
    this.clock = opts.clock ?? (() => new Date())
    log.debug(`AI classification ${this.ai ? 'enabled' : 'disabled'}`)
  }

  get current(): Dataset {
    return this.dataset
  }

  /**
   * Analyzes `items` and makes them the active dataset. When loads overlap, the one started
   * last wins; an earlier load still resolves with its dataset but does not replace the active one.
   */
  async loadItems(items: readonly SourceItem[], origin: DatasetOrigin, notices: Notice[] = []): Promise<Dataset> {
    return this.install(++this.loadSeq, items, origin, notices)
  }

  /** Collects from `sources` (through the cache when one is configured) and loads the result. */
  async load(sources: readonly FeedbackSource[], opts: { refresh?: boolean } = {}): Promise<Dataset> {
    const seq = ++this.loadSeq
    const collected = await collectFeedback(sources, { cache: this.opts.cache, refresh: opts.refresh, now: this.clock() })
    return this.install(seq, collected.items, collected.origin, collected.notices)
  }

  /** Replaces the dataset with freshly generated sample feedback. */
  async regenerate(opts: SyntheticOptions = {}): Promise<Dataset> {
    const seq = ++this.loadSeq
    const items = await syntheticSource({ now: this.clock(), ...opts }).fetch()
    return this.install(seq, items, 'synthetic')
  }

  private async install(seq: number, items: readonly SourceItem[], origin: DatasetOrigin, notices: Notice[] = []): Promise<Dataset> {
    const now = this.clock()
    const result = await analyzeFeedback(items, {
      ai: this.ai,
      concurrency: this.opts.config.ai.concurrency,
      config: this.analysis,
      ingestedAt: now
    })
    const next = freezeDataset(result.records, {
      notices: Object.freeze(mergeNotices(notices, result.notices)),
      stats: Object.freeze(result.stats),
      origin,
      loadedAt: now.toISOString()
    })
    if (seq !== this.loadSeq) {
      log.warn(`discarding ${origin} load superseded by a newer one`)
      return next
    }
    this.dataset = next
    log.info(`loaded ${next.records.length} records (${origin})`, result.stats)
    return next
  }

  records(filters: FeedbackFilters = {}): AnalyzedRecord[] {
    return applyFilters(this.dataset.records, filters)
  }

  snapshot(filters: FeedbackFilters = {}, bucket: BucketWidth = 'day'): InsightSnapshot {
    const { records, notices } = this.dataset
    return buildSnapshot(records, filters, { bucket, notices: [...notices], config: this.analysis })
  }

  async ask(question: string, filters: FeedbackFilters = {}): Promise<Answer> {
    return this.summarizer.answer(question, this.snapshot(filters))
  }

  report(filters: FeedbackFilters = {}): ReportData {
    return buildReportData(this.snapshot(filters), this.clock())
  }

  async exportReport(filters: FeedbackFilters = {}, dir: string = this.opts.config.reportsDir): Promise<ReportPaths> {
    const report = this.report(filters)
    const stamp = report.generatedAt.replace(/[-:]/g, '').replace('T', '_').slice(0, 15)
    return exportReport(dir, `feedback_report_${stamp}`, report)
  }
}
