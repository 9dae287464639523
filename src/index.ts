export * from './feedback/types'
export { parseFeedbackDate } from './feedback/dates'
export { normalizeItem, normalizeItems, parseRating } from './feedback/normalize'
export type { NormalizeOptions, NormalizeResult } from './feedback/normalize'

export { defaultAnalysisConfig, mergeAnalysisConfig } from './analysis/config'
export type { AnalysisConfig, AnalysisOverrides } from './analysis/config'
export { classifyByRules } from './analysis/sentiment'
export { AiSentimentClassifier } from './analysis/aiClassifier'
export type { SentimentClassifier } from './analysis/aiClassifier'
export { classifyRecords, classifyWithFallback } from './analysis/classify'
export { extractTopics, tagTopics } from './analysis/topics'
export { assessIssue, bugBoard, featureRequests, prioritizeRecords } from './analysis/prioritize'
export { bucketRecords, computeTrends, headlineTrends } from './analysis/trends'

export { applyFilters } from './insights/filter'
export { buildSnapshot, computeKpis, sourceBreakdown } from './insights/snapshot'
export type { InsightSnapshot } from './insights/snapshot'
export { createSummarizer, insightLines, LlmSummarizer, TemplateSummarizer } from './insights/summarizer'
export type { Answer, Summarizer } from './insights/summarizer'
export { buildReportData, exportReport, renderReportHtml } from './insights/report'
export type { ReportData } from './insights/report'
export { analyzeFeedback, FeedbackInsightEngine } from './insights/engine'
export type { Dataset, EngineOptions } from './insights/engine'

export { collectFeedback, csvFileSource, csvTextSource, syntheticSource } from './sources'
export type { FeedbackSource } from './sources'
export { DatasetCache } from './sources/cache'
export { generateSyntheticItems } from './sources/synthetic'

export { loadConfig } from './config'
export type { FeedbackConfig } from './config'
export { ContractViolationError, mergeNotices } from './errors'
export type { Notice, NoticeKind, Result } from './errors'
export { createLLMCaller } from './llm'
export type { LLMCaller, LLMResponse } from './llm'
export { createApp, startServer } from './server'
