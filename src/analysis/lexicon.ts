import lexiconData from './lexicon.json'

export interface Lexicon {
  positive: string[]
  negative: string[]
  /** A single-word sentiment term directly after one of these counts for the other side. */
  negators: string[]
  bug: string[]
  critical: string[]
  feature: string[]
  stopwords: string[]
}

export const defaultLexicon: Lexicon = lexiconData

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[‘’`]/g, "'")
    .replace(/[^a-z0-9'\s]/g, ' ')
    .split(/\s+/)
    .map((t) => t.replace(/^'+|'+$/g, ''))
    .filter(Boolean)
}

export type TermMatch = {
  term: string
  /** Token index where the match starts. */
  index: number
  length: number
}

/**
 * Matches a term list against token streams. A trailing `*` makes a word a prefix
 * (`crash*` matches crashes, crashed); a multi-word term must match consecutive tokens.
 */
export class TermMatcher {
  private readonly compiled: Array<{ term: string; parts: Array<{ word: string; prefix: boolean }> }>

  constructor(terms: readonly string[]) {
    this.compiled = terms.map((term) => ({
      term,
      parts: tokenizeTerm(term).map((p) =>
        p.endsWith('*') ? { word: p.slice(0, -1), prefix: true } : { word: p, prefix: false }
      )
    }))
  }

  matches(tokens: readonly string[]): TermMatch[] {
    const out: TermMatch[] = []
    for (let i = 0; i < tokens.length; i++) {
      for (const { term, parts } of this.compiled) {
        if (parts.length === 0 || i + parts.length > tokens.length) continue
        const hit = parts.every(({ word, prefix }, k) => (prefix ? tokens[i + k].startsWith(word) : tokens[i + k] === word))
        if (hit) out.push({ term, index: i, length: parts.length })
      }
    }
    return out
  }

  count(tokens: readonly string[]): number {
    return this.matches(tokens).length
  }

  test(tokens: readonly string[]): boolean {
    return this.count(tokens) > 0
  }
}

// like tokenize() but keeps the `*` prefix marker
function tokenizeTerm(term: string): string[] {
  return term
    .toLowerCase()
    .replace(/[^a-z0-9'*\s]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
}

/** Matchers for every list of a lexicon, built once and shared by the analysis steps. */
export interface CompiledLexicon {
  positive: TermMatcher
  negative: TermMatcher
  negators: ReadonlySet<string>
  bug: TermMatcher
  critical: TermMatcher
  feature: TermMatcher
  stopwords: ReadonlySet<string>
}

const compiledCache = new WeakMap<Lexicon, CompiledLexicon>()

export function compileLexicon(lexicon: Lexicon = defaultLexicon): CompiledLexicon {
  const cached = compiledCache.get(lexicon)
  if (cached) return cached
  const compiled: CompiledLexicon = {
    positive: new TermMatcher(lexicon.positive),
    negative: new TermMatcher(lexicon.negative),
    negators: new Set(lexicon.negators),
    bug: new TermMatcher(lexicon.bug),
    critical: new TermMatcher(lexicon.critical),
    feature: new TermMatcher(lexicon.feature),
    stopwords: new Set(lexicon.stopwords)
  }
  compiledCache.set(lexicon, compiled)
  return compiled
}
