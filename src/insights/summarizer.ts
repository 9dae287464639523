import { mergeNotices, notice, Notice } from '../errors'
import type { AnalyzedRecord, HeadlineTrend } from '../feedback/types'
import type { LLMCaller } from '../llm'
import { scoped } from '../logger'
import type { InsightSnapshot } from './snapshot'

const log = scoped('summarizer')

export type AnsweredBy = 'ai' | 'template'

export interface Answer {
  answer: string
  answeredBy: AnsweredBy
  notices: Notice[]
}

export interface Summarizer {
  answer(question: string, snapshot: InsightSnapshot): Promise<Answer>
}

export interface InsightLine {
  title: string
  body: string
}

const signed = (n: number) => `${n >= 0 ? '+' : ''}${n.toFixed(3)}`
const excerpt = (text: string, max = 80) => (text.length > max ? `${text.slice(0, max - 3)}...` : text)

function healthLabel(avgScore: number): string {
  if (avgScore > 0.2) return 'Healthy'
  if (avgScore < -0.1) return 'Needs attention'
  return 'Neutral'
}

/** The four automated insight paragraphs shown on the dashboard and in reports. */
export function insightLines(snapshot: InsightSnapshot): InsightLine[] {
  const { kpis } = snapshot
  const avgScore = kpis.avgScore ?? 0
  const topTopics = snapshot.topics.slice(0, 3).map((t) => t.topic)
  return [
    {
      title: 'Sentiment health',
      body:
        `Overall sentiment score: ${signed(avgScore)}. ` +
        `${kpis.positivePct.toFixed(1)}% positive, ${kpis.negativePct.toFixed(1)}% negative. ${healthLabel(avgScore)}.`
    },
    {
      title: 'Bug pressure',
      body:
        `${kpis.bugCount} bug reports detected, of which ${kpis.criticalCount} are critical. ` +
        (kpis.criticalCount > 2 ? 'Immediate engineering attention required.' : 'Monitor for recurrence.')
    },
    {
      title: 'Feature momentum',
      body:
        `${kpis.featureCount} feature requests captured.` +
        (topTopics.length ? ` Top topics: ${topTopics.join(', ')}.` : '')
    },
    {
      title: 'Source coverage',
      body: snapshot.sources.length
        ? `Reviews collected from: ${snapshot.sources.map((s) => `${s.source} (${s.count})`).join(', ')}.`
        : 'No reviews in the current selection.'
    }
  ]
}

const arrow = (label: string, t: HeadlineTrend) =>
  t.delta === null ? `${label} is flat (not enough data)` : `${label} is ${t.direction} (${signed(t.delta)})`

const listRecords = (records: AnalyzedRecord[], describe: (r: AnalyzedRecord) => string) =>
  records.slice(0, 3).map((r) => `- ${describe(r)}: "${excerpt(r.text)}"`)

/**
 * Answers from the snapshot alone. The question picks which section leads; the KPI
 * overview is always included.
 */
export class TemplateSummarizer implements Summarizer {
  async answer(question: string, snapshot: InsightSnapshot): Promise<Answer> {
    return { answer: this.compose(question, snapshot), answeredBy: 'template', notices: [] }
  }

  compose(question: string, snapshot: InsightSnapshot): string {
    const { kpis } = snapshot
    if (kpis.total === 0) return 'No feedback matches the current filters.'

    const q = question.toLowerCase()
    const lines: string[] = [
      `${kpis.total} reviews: ${kpis.positivePct.toFixed(1)}% positive, ${kpis.negativePct.toFixed(1)}% negative` +
        (kpis.avgRating !== null ? `, average rating ${kpis.avgRating.toFixed(2)}.` : '.')
    ]

    if (/bug|crash|issue|critical|problem|fix/.test(q)) {
      lines.push(`${kpis.bugCount} bugs, ${kpis.criticalCount} critical.`)
      lines.push(...listRecords(snapshot.bugs, (r) => (r.isBug ? r.priority : 'bug')))
    } else if (/feature|request|wish|idea|roadmap/.test(q)) {
      lines.push(`${kpis.featureCount} feature requests.`)
      lines.push(...listRecords(snapshot.features, (r) => (r.rating !== undefined ? `${r.rating} stars` : 'unrated')))
    } else if (/trend|week|improv|wors|chang/.test(q)) {
      const { headline } = snapshot
      lines.push(`${arrow('Sentiment', headline.sentiment)}; ${arrow('rating', headline.rating)}; ${arrow('bug rate', headline.bugRate)}.`)
    } else if (/topic|theme|talk|mention|keyword/.test(q)) {
      lines.push(`Top topics: ${snapshot.topics.map((t) => `${t.topic} (${t.count})`).join(', ') || 'none'}.`)
    } else {
      lines.push(...insightLines(snapshot).map((l) => `${l.title}: ${l.body}`))
    }
    return lines.join('\n')
  }
}

const SYSTEM_PROMPT = `You are a product analytics expert. Answer the user's question using only the app review data provided.
Give a concise, actionable answer of 3-5 sentences and quote specific numbers from the data.`

/** Compact view of the snapshot for the prompt; full record lists would crowd out the question. */
export function promptPayload(snapshot: InsightSnapshot) {
  const brief = (r: AnalyzedRecord) => ({
    source: r.source,
    rating: r.rating,
    date: r.date.slice(0, 10),
    sentiment: r.sentiment,
    priority: r.priority,
    text: excerpt(r.text, 200)
  })
  return {
    filters: snapshot.filters,
    kpis: snapshot.kpis,
    sources: snapshot.sources,
    topics: snapshot.topics,
    headline: snapshot.headline,
    bugs: snapshot.bugs.map(brief),
    features: snapshot.features.map(brief)
  }
}

export class LlmSummarizer implements Summarizer {
  constructor(
    private readonly callLLM: LLMCaller,
    private readonly fallback: TemplateSummarizer = new TemplateSummarizer()
  ) {}

  async answer(question: string, snapshot: InsightSnapshot): Promise<Answer> {
    const userQuery = `Question: ${question}\n\nData summary:\n${JSON.stringify(promptPayload(snapshot), null, 2)}`
    const res = await this.callLLM(SYSTEM_PROMPT, userQuery, { temperature: 0.3 })
    if (res.success && res.data) return { answer: res.data, answeredBy: 'ai', notices: [] }

    const reason = res.error ?? 'empty response'
    log.warn('AI answer unavailable, using template summary:', reason)
    const answer = await this.fallback.answer(question, snapshot)
    return {
      ...answer,
      notices: mergeNotices(answer.notices, [notice('QueryUnanswerable', 1, `AI answer unavailable (${reason}); showing a statistical summary`)])
    }
  }
}

/** The AI summarizer when a caller is available, the template one otherwise. */
export function createSummarizer(callLLM?: LLMCaller): Summarizer {
  return callLLM ? new LlmSummarizer(callLLM) : new TemplateSummarizer()
}
