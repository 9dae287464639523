import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, describe, expect, it } from 'vitest'
import { analyzed, day } from '../../test/fixtures'
import { buildReportData, escapeHtml, exportReport, renderReportHtml } from './report'
import { buildSnapshot } from './snapshot'

const generatedAt = new Date('2024-02-01T09:30:00Z')

const bugs = Array.from({ length: 10 }, (_, i) =>
  analyzed({ id: `bug${i}`, sentiment: 'negative', sentimentScore: -0.7, priority: 'high', date: day(i), text: `Export broken <script>alert(${i})</script>` })
)

describe('buildReportData', () => {
  it('keeps the fixed top-N sections', () => {
    const report = buildReportData(buildSnapshot(bugs), generatedAt)
    expect(report.generatedAt).toBe('2024-02-01T09:30:00.000Z')
    expect(report.bugs).toHaveLength(8)
    expect(report.bugs[0].id).toBe('bug9')
    expect(report.insights.map((l) => l.title)).toEqual(['Sentiment health', 'Bug pressure', 'Feature momentum', 'Source coverage'])
  })
})

describe('renderReportHtml', () => {
  it('escapes review text', () => {
    const html = renderReportHtml(buildReportData(buildSnapshot(bugs), generatedAt))
    expect(html).toContain('<td>Export broken &lt;script&gt;alert(9)&lt;/script&gt;</td>')
    expect(html).not.toContain('<script>')
  })

  it('escapes quotes', () => {
    expect(escapeHtml(`"a" & 'b'`)).toBe('&quot;a&quot; &amp; &#39;b&#39;')
  })
})

describe('exportReport', () => {
  let dir = ''
  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true })
  })

  it('writes the JSON data and the HTML page', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'feedback-report-'))
    const report = buildReportData(buildSnapshot(bugs), generatedAt)
    const paths = await exportReport(path.join(dir, 'nested'), 'weekly', report)
    expect(paths).toEqual({ jsonPath: path.join(dir, 'nested', 'weekly.json'), htmlPath: path.join(dir, 'nested', 'weekly.html') })
    expect(JSON.parse(await fs.readFile(paths.jsonPath, 'utf8'))).toEqual(JSON.parse(JSON.stringify(report)))
    expect(await fs.readFile(paths.htmlPath, 'utf8')).toBe(renderReportHtml(report))
  })
})
