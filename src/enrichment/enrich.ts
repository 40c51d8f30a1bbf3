import { Provider, callLLM, extractJSON } from '../llm'
import { scoped } from '../logger'
import { serializeDecision } from '../fusion/assembler'
import { FusedDecision } from '../fusion/types'

const log = scoped('enrich')

export interface Enrichment {
  explanation?: string
  recommendedAction?: string
}

/** Rewrites the prose of a decision. Never touches priority, scores or the chosen scenario. */
export interface ExplanationEnricher {
  name: string
  enrich(decision: FusedDecision, signal: AbortSignal): Promise<Enrichment>
}

export const templateEnricher: ExplanationEnricher = {
  name: 'template',
  enrich: async () => ({})
}

export const ENRICH_SYSTEM_PROMPT = `You are a financial risk analyst. You receive a tactical decision produced by a
deterministic fusion engine as JSON. Rewrite its explanation for an executive reader and sharpen the recommended
action. Do not change the recommended scenario, the priority or any number.
Respond only with JSON: {"explanation": string, "recommended_action": string}`

export interface LlmEnricherOptions {
  provider?: Provider
  model?: string
  retries?: number
}

export function createLlmEnricher(opts: LlmEnricherOptions = {}): ExplanationEnricher {
  const provider = opts.provider ?? 'ollama'
  const model = opts.model ?? 'llama3.2'
  return {
    name: `llm:${provider}:${model}`,
    async enrich(decision, signal) {
      const user = JSON.stringify(serializeDecision(decision), null, 2)
      const res = await callLLM(ENRICH_SYSTEM_PROMPT, user, provider, model, opts.retries ?? 1, signal)
      if (!res.success || !res.data) throw new Error(`LLM enrichment failed: ${res.error ?? 'empty response'}`)
      const parsed = extractJSON(res.data)
      const out: Enrichment = {}
      if (typeof parsed.explanation === 'string' && parsed.explanation.trim()) out.explanation = parsed.explanation.trim()
      if (typeof parsed.recommended_action === 'string' && parsed.recommended_action.trim()) {
        out.recommendedAction = parsed.recommended_action.trim()
      }
      return out
    }
  }
}

/**
 * Run an enricher under a timeout. Any failure, timeout or empty answer leaves
 * the template decision as it is.
 */
export async function enrichDecision(
  decision: FusedDecision,
  enricher: ExplanationEnricher,
  timeoutMs = 15000
): Promise<FusedDecision> {
  if (enricher === templateEnricher) return decision
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new Error(`${enricher.name} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })

  try {
    const result = await Promise.race([enricher.enrich(decision, controller.signal), timeout])
    if (!result.explanation && !result.recommendedAction) {
      log.warn(`${enricher.name} returned nothing; keeping template explanation`)
      return decision
    }
    return {
      ...decision,
      explanation: result.explanation ?? decision.explanation,
      recommendedAction: result.recommendedAction ?? decision.recommendedAction
    }
  } catch (e) {
    log.warn(`${enricher.name} failed; keeping template explanation:`, e instanceof Error ? e.message : e)
    return decision
  } finally {
    clearTimeout(timer)
  }
}
