#!/usr/bin/env node
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'node:path'
import { loadConfig } from './config'
import type { Notice } from './errors'
import type { BucketWidth, HeadlineTrend } from './feedback/types'
import { FeedbackInsightEngine } from './insights/engine'
import { InsightSnapshot } from './insights/snapshot'
import { insightLines } from './insights/summarizer'
import { DatasetCache } from './sources/cache'
import { writeSampleCsv } from './sources/csvSource'
import { csvFileSource, FeedbackSource } from './sources'
import { startServer } from './server'

type Flags = { positional: string[]; values: Map<string, string>; switches: Set<string> }

const VALUE_FLAGS = new Set(['--csv', '--synthetic', '--bucket'])

function parseFlags(argv: string[]): Flags {
  const flags: Flags = { positional: [], values: new Map(), switches: new Set() }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[++i]
      if (value === undefined) throw new Error(`${arg} needs a value`)
      flags.values.set(arg, value)
    } else if (arg.startsWith('--')) {
      flags.switches.add(arg)
    } else {
      flags.positional.push(arg)
    }
  }
  return flags
}

function bucketFlag(flags: Flags): BucketWidth {
  const b = flags.values.get('--bucket') ?? 'day'
  if (b !== 'day' && b !== 'week') throw new Error(`--bucket must be day or week, got "${b}"`)
  return b
}

function createEngine() {
  const config = loadConfig()
  const engine = new FeedbackInsightEngine({ config, cache: new DatasetCache(config.dataDir, config.cacheTtlHours) })
  return { config, engine }
}

/** Loads the CSV named by --csv, a generated dataset of --synthetic items, or the default sample. */
async function loadFrom(engine: FeedbackInsightEngine, flags: Flags) {
  const csvPath = flags.values.get('--csv')
  if (csvPath) {
    const sources: FeedbackSource[] = [csvFileSource(csvPath)]
    return engine.load(sources, { refresh: true })
  }
  const count = Number(flags.values.get('--synthetic') ?? 200)
  if (!Number.isInteger(count) || count < 1) throw new Error('--synthetic must be a positive integer')
  return engine.regenerate({ count })
}

const arrow = (t: HeadlineTrend) => (t.direction === 'up' ? '↑' : t.direction === 'down' ? '↓' : '→')

function printNotices(notices: readonly Notice[]) {
  for (const n of notices) console.log(`! ${n.message}`)
}

function printSnapshot(s: InsightSnapshot) {
  const k = s.kpis
  console.log(`Reviews: ${k.total}  positive ${k.positivePct}%  negative ${k.negativePct}%`)
  console.log(
    `Avg score: ${k.avgScore ?? 'n/a'} ${arrow(s.headline.sentiment)}  avg rating: ${k.avgRating ?? 'n/a'} ${arrow(s.headline.rating)}  ` +
      `bugs: ${k.bugCount} (${k.criticalCount} critical) ${arrow(s.headline.bugRate)}  feature requests: ${k.featureCount}`
  )
  console.log('\nSources:')
  for (const src of s.sources) console.log(`  ${src.source.padEnd(12)} ${String(src.count).padStart(5)}  ${src.share}%`)
  console.log('\nTop topics:')
  console.log('  ' + (s.topics.map((t) => `${t.topic} (${t.count})`).join(', ') || 'none'))
  console.log('\nBug board:')
  for (const b of s.bugs) console.log(`  [${b.priority}] ${b.date.slice(0, 10)} ${b.text.slice(0, 90)}`)
  console.log('\nFeature requests:')
  for (const f of s.features) console.log(`  (${f.rating ?? '-'}) ${f.text.slice(0, 90)}`)
  console.log('\nInsights:')
  for (const l of insightLines(s)) console.log(`  ${l.title}: ${l.body}`)
  console.log(`\nTrend buckets (${s.trends.width}): ${s.trends.buckets.length}`)
}

async function cmdAnalyze(flags: Flags) {
  const { engine } = createEngine()
  const dataset = await loadFrom(engine, flags)
  printNotices(dataset.notices)
  printSnapshot(engine.snapshot({}, bucketFlag(flags)))
}

async function cmdAsk(flags: Flags) {
  const question = flags.positional.join(' ').trim()
  if (!question) throw new Error('Usage: ask <question> [--csv <file>]')
  const { engine } = createEngine()
  await loadFrom(engine, flags)
  const answer = await engine.ask(question)
  printNotices(answer.notices)
  console.log(answer.answer)
}

async function cmdReport(flags: Flags) {
  const { config, engine } = createEngine()
  const outDir = flags.positional[0] ? path.resolve(flags.positional[0]) : config.reportsDir
  await loadFrom(engine, flags)
  const paths = await engine.exportReport({}, outDir)
  console.log('Report written to', paths.htmlPath)
  console.log('Report data written to', paths.jsonPath)
}

async function cmdSampleCsv(flags: Flags) {
  const file = flags.positional[0]
  if (!file) throw new Error('Usage: sample-csv <file>')
  console.log('Sample CSV written to', await writeSampleCsv(file))
}

async function cmdServe(flags: Flags) {
  const { config, engine } = createEngine()
  await loadFrom(engine, flags)
  await startServer(engine, config.port)
}

async function main(argv: string[]) {
  dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
  const cmd = argv[0]
  try {
    const flags = parseFlags(argv.slice(1))
    if (cmd === 'analyze') await cmdAnalyze(flags)
    else if (cmd === 'ask') await cmdAsk(flags)
    else if (cmd === 'report') await cmdReport(flags)
    else if (cmd === 'sample-csv') await cmdSampleCsv(flags)
    else if (cmd === 'serve') await cmdServe(flags)
    else {
      console.log('Usage: feedback-insights <command> [args]')
      console.log('Commands:')
      console.log('  analyze [--csv <file>] [--synthetic <n>] [--bucket day|week]')
      console.log('  ask <question> [--csv <file>]')
      console.log('  report [outDir] [--csv <file>]')
      console.log('  sample-csv <file>')
      console.log('  serve [--csv <file>]')
      process.exit(1)
    }
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err)
    process.exit(1)
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}

export { main, parseFlags }
