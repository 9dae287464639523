import { Ollama } from 'ollama'
import type { AiConfig } from './config'
import { debug } from './logger'

const MODEL_MAX_CTX = 32000

export type LLMResponse = {
  success: boolean
  data?: string
  error?: string
}

export type LLMCallOptions = {
  /** Ask the model for JSON and re-wrap whatever object it returns in a ```json fence. */
  json?: boolean
  temperature?: number
  retries?: number
}

/** The single seam the analytics code talks to; tests substitute a fake. */
export type LLMCaller = (systemPrompt: string, userQuery: string, options?: LLMCallOptions) => Promise<LLMResponse>

type JsonObject = Record<string, unknown>

const isObject = (v: unknown): v is JsonObject => typeof v === 'object' && v !== null && !Array.isArray(v)

function wrapAsJSONCodeFence(obj: unknown): string {
  const pretty = JSON.stringify(obj, null, 2)
  return '\n\n```json\n' + pretty + '\n```\n'
}

/**
 * Models wrap JSON in prose or fences more often than not. Take the whole message if it
 * parses, otherwise the first embedded object that does, otherwise `{ text }`.
 */
export function extractOrCreateJSON(fullMessage: string): unknown {
  try {
    return JSON.parse(fullMessage)
  } catch {
    const candidates = Array.from(fullMessage.matchAll(/(\{[\s\S]*?\})/g)).map((r) => r[1])
    for (const jsonText of candidates) {
      try {
        const parsed: unknown = JSON.parse(jsonText)
        if (!isObject(parsed)) continue
        // some providers nest the real payload as a string under text/message/content
        for (const key of ['text', 'message', 'content']) {
          const inner = parsed[key]
          if (typeof inner !== 'string') continue
          try {
            const innerParsed: unknown = JSON.parse(inner)
            if (isObject(innerParsed)) return innerParsed
          } catch {
            // plain prose, keep looking
            continue
          }
        }
        if (Object.keys(parsed).length > 0) return parsed
      } catch {
        // unbalanced braces; try the next candidate
        continue
      }
    }
    return { text: fullMessage }
  }
}

/** Only JSON inside a ```json ... ``` fence is accepted. */
export function parseFencedJSON(fenced: string | undefined): unknown {
  if (!fenced) return null
  const m = fenced.match(/```(?:json\n)?([\s\S]*?)```/i)
  if (!m) return null
  try {
    return JSON.parse(m[1])
  } catch {
    return null
  }
}

function createClient(cfg: AiConfig): Ollama {
  const headers: Record<string, string> = {}
  if (cfg.apiKey) headers.Authorization = `Bearer ${cfg.apiKey}`
  return new Ollama({
    host: cfg.host,
    headers,
    // every request, streamed or not, is cut off once the configured budget is spent
    fetch: (input, init) => fetch(input, { ...init, signal: AbortSignal.timeout(cfg.timeoutMs) })
  })
}

async function callOllama(
  client: Ollama,
  model: string,
  systemPrompt: string,
  userQuery: string,
  options: LLMCallOptions
): Promise<string> {
  const response = await client.chat({
    model,
    stream: true,
    format: options.json ? 'json' : undefined,
    options: {
      num_ctx: MODEL_MAX_CTX,
      temperature: options.temperature ?? 0.05
    },
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  let fullMessage = ''
  for await (const chunk of response) {
    if (chunk.message?.content) fullMessage += chunk.message.content
  }
  return fullMessage
}

/**
 * Binds an LLM caller to the configured endpoint. Transport failures are retried with a
 * short linear backoff; the final failure is reported, never thrown.
 */
export function createLLMCaller(cfg: AiConfig): LLMCaller {
  const client = createClient(cfg)

  return async function callLLM(systemPrompt, userQuery, options = {}) {
    const retries = options.retries ?? 1
    const tokenCount = (systemPrompt.length + userQuery.length) / 4 // rough estimate
    debug('LLM token count', tokenCount)
    if (tokenCount > MODEL_MAX_CTX) {
      debug(`LLM prompt token count (${tokenCount}) exceeds model max context (${MODEL_MAX_CTX})`)
    }

    let lastErr: unknown = null
    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const raw = await callOllama(client, cfg.model, systemPrompt, userQuery, options)
        debug('LLM raw response', raw)
        if (!options.json) return { success: true, data: raw.trim() }
        return { success: true, data: wrapAsJSONCodeFence(extractOrCreateJSON(raw)) }
      } catch (e) {
        lastErr = e
        debug(`LLM attempt ${attempt} failed`, e)
        if (attempt < retries) await new Promise((r) => setTimeout(r, 200 * (attempt + 1)))
      }
    }
    return { success: false, error: String(lastErr) }
  }
}
