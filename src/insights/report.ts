import path from 'path'
import type { AnalyzedRecord, FeedbackFilters, Kpis, SourceShare, TopicCount } from '../feedback/types'
import { atomicWrite } from '../interfaces/atomicWrite'
import type { InsightSnapshot } from './snapshot'
import { InsightLine, insightLines } from './summarizer'

export const REPORT_LIMITS = { bugs: 8, features: 6, topics: 8 } as const

/** Fixed-shape export handed to whatever renders the printable report. */
export interface ReportData {
  generatedAt: string
  filters: FeedbackFilters
  kpis: Kpis
  sources: SourceShare[]
  bugs: AnalyzedRecord[]
  features: AnalyzedRecord[]
  topics: TopicCount[]
  insights: InsightLine[]
}

export function buildReportData(snapshot: InsightSnapshot, generatedAt: Date): ReportData {
  return {
    generatedAt: generatedAt.toISOString(),
    filters: snapshot.filters,
    kpis: snapshot.kpis,
    // largest share first, as in the printed table
    sources: [...snapshot.sources].sort((a, b) => b.count - a.count),
    bugs: snapshot.bugs.slice(0, REPORT_LIMITS.bugs),
    features: snapshot.features.slice(0, REPORT_LIMITS.features),
    topics: snapshot.topics.slice(0, REPORT_LIMITS.topics),
    insights: insightLines(snapshot)
  }
}

export function escapeHtml(s: string) {
  return s.replace(/[&<>"']/g, (c) => HTML_ENTITIES[c] ?? c)
}

const HTML_ENTITIES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;' }

const fmt = (n: number | null, digits: number) => (n === null ? 'n/a' : n.toFixed(digits))

function table(headers: string[], rows: string[][]) {
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join('')
  const body = rows.map((r) => `<tr>${r.map((c) => `<td>${escapeHtml(c)}</td>`).join('')}</tr>`).join('\n')
  return `<table><thead><tr>${head}</tr></thead><tbody>\n${body}\n</tbody></table>`
}

export function renderReportHtml(report: ReportData): string {
  const { kpis } = report
  const snippet = (r: AnalyzedRecord) => (r.text.length > 160 ? `${r.text.slice(0, 157)}...` : r.text)
  return `<!doctype html>
<meta charset="utf-8"/>
<title>Feedback report</title>
<style>body{font-family:system-ui, sans-serif;line-height:1.4;max-width:960px;margin:2em auto} table{border-collapse:collapse;width:100%;margin:0.5em 0 1.5em} th,td{border:1px solid #e2e8f0;padding:4px 8px;text-align:left} th{background:#1e293b;color:#fff} .insight{margin:0.5em 0;padding:0.5em;border-left:3px solid #6366f1}</style>
<h1>Feedback report</h1>
<p>Generated ${escapeHtml(report.generatedAt)}</p>
<h2>Executive summary</h2>
${table(
  ['Total reviews', 'Positive', 'Negative', 'Avg score', 'Avg rating', 'Bugs', 'Critical bugs'],
  [
    [
      String(kpis.total),
      `${kpis.positivePct.toFixed(1)}%`,
      `${kpis.negativePct.toFixed(1)}%`,
      fmt(kpis.avgScore, 3),
      fmt(kpis.avgRating, 2),
      String(kpis.bugCount),
      String(kpis.criticalCount)
    ]
  ]
)}
<h2>Reviews by source</h2>
${table(['Source', 'Reviews', 'Share'], report.sources.map((s) => [s.source, String(s.count), `${s.share.toFixed(1)}%`]))}
<h2>Top bugs</h2>
${table(['Priority', 'Source', 'Date', 'Review'], report.bugs.map((r) => [r.priority ?? '', r.source, r.date.slice(0, 10), snippet(r)]))}
<h2>Top feature requests</h2>
${table(['Rating', 'Source', 'Date', 'Review'], report.features.map((r) => [r.rating === undefined ? '' : String(r.rating), r.source, r.date.slice(0, 10), snippet(r)]))}
<h2>Top topics</h2>
${table(['Topic', 'Mentions'], report.topics.map((t) => [t.topic, String(t.count)]))}
<h2>Insights</h2>
${report.insights.map((l) => `<div class="insight"><strong>${escapeHtml(l.title)}</strong>: ${escapeHtml(l.body)}</div>`).join('\n')}
`
}

export interface ReportPaths {
  jsonPath: string
  htmlPath: string
}

export async function exportReport(dir: string, base: string, report: ReportData): Promise<ReportPaths> {
  const jsonPath = await atomicWrite(path.join(dir, `${base}.json`), JSON.stringify(report, null, 2))
  const htmlPath = await atomicWrite(path.join(dir, `${base}.html`), renderReportHtml(report))
  return { jsonPath, htmlPath }
}
