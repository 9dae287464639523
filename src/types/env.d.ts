declare namespace NodeJS {
  interface ProcessEnv {
    LLM_HOST?: string
    LLM_MODEL?: string
    LLM_API_KEY?: string
    LLM_TIMEOUT_MS?: string
    LLM_CONCURRENCY?: string
    GOOGLE_PLAY_APP_ID?: string
    APPSTORE_APP_ID?: string
    DATA_DIR?: string
    REPORTS_DIR?: string
    CACHE_TTL_HOURS?: string
    UI_PORT?: string
    DEV_LOG?: string
  }
}
