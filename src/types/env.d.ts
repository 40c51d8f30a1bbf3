declare namespace NodeJS {
  interface ProcessEnv {
    FUSION_PRESET?: string
    LLM_PROVIDER?: string
    LLM_MODEL?: string
    LLM_TIMEOUT_MS?: string
    DEV_LOG?: string
  }
}
