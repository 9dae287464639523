import appRootPath from 'app-root-path'
import path from 'node:path'
import { z } from 'zod'

const intFrom = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === '') return fallback
      const n = Number(v)
      if (!Number.isInteger(n) || n < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}, got "${v}"` })
        return z.NEVER
      }
      return n
    })

const text = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : fallback))

const EnvSchema = z.object({
  LLM_HOST: text('http://127.0.0.1:11434'),
  LLM_MODEL: text('llama3.1:8b'),
  LLM_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined)),
  LLM_TIMEOUT_MS: intFrom(20_000, 1),
  LLM_CONCURRENCY: intFrom(4, 1),
  GOOGLE_PLAY_APP_ID: text('com.example.app'),
  APPSTORE_APP_ID: text('000000000'),
  DATA_DIR: text('.tmp/feedback'),
  REPORTS_DIR: text('.tmp/reports'),
  CACHE_TTL_HOURS: intFrom(2, 0),
  UI_PORT: intFrom(5175, 0)
})

export interface AiConfig {
  /** True only when a credential is configured; every AI call is skipped otherwise. */
  readonly enabled: boolean
  readonly host: string
  readonly model: string
  readonly apiKey?: string
  readonly timeoutMs: number
  readonly concurrency: number
}

export interface FeedbackConfig {
  readonly ai: AiConfig
  readonly sources: {
    readonly googlePlayAppId: string
    readonly appStoreAppId: string
  }
  readonly dataDir: string
  readonly reportsDir: string
  readonly cacheTtlHours: number
  readonly port: number
}

function freeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object') freeze(value)
  }
  Object.freeze(obj)
  return obj
}

/**
 * Builds the process configuration once. Relative directories resolve against `root`
 * (the project root by default) so the CLI and the server agree on paths.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  root: string = appRootPath.path
): FeedbackConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }
  const e = parsed.data
  return freeze<FeedbackConfig>({
    ai: {
      enabled: e.LLM_API_KEY !== undefined,
      host: e.LLM_HOST,
      model: e.LLM_MODEL,
      apiKey: e.LLM_API_KEY,
      timeoutMs: e.LLM_TIMEOUT_MS,
      concurrency: e.LLM_CONCURRENCY
    },
    sources: {
      googlePlayAppId: e.GOOGLE_PLAY_APP_ID,
      appStoreAppId: e.APPSTORE_APP_ID
    },
    dataDir: path.resolve(root, e.DATA_DIR),
    reportsDir: path.resolve(root, e.REPORTS_DIR),
    cacheTtlHours: e.CACHE_TTL_HOURS,
    port: e.UI_PORT
  })
}
