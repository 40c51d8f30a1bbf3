import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const { chat } = vi.hoisted(() => ({ chat: vi.fn() }))

vi.mock('ollama', () => ({ default: { chat } }))

import { financial, kg, scenarios } from '../../test/fixtures/example'
import { synthesize } from '../fusion/engine'
import { Enrichment, ExplanationEnricher, createLlmEnricher, enrichDecision, templateEnricher } from './enrich'

const decision = synthesize(financial, kg, scenarios)

function enricher(enrich: ExplanationEnricher['enrich']): ExplanationEnricher {
  return { name: 'fake', enrich }
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
})

afterEach(() => {
  vi.restoreAllMocks()
  chat.mockReset()
})

describe('enrichDecision', () => {
  it('replaces only the prose', async () => {
    const out = await enrichDecision(
      decision,
      enricher(async () => ({ explanation: 'Renegotiate now; the budget cannot absorb a delay.' })),
      1000
    )
    expect(out.explanation).toBe('Renegotiate now; the budget cannot absorb a delay.')
    expect(out.recommendedAction).toBe(decision.recommendedAction)
    expect(out.metaFusion).toEqual(decision.metaFusion)
    expect(out.tacticalPriority).toBe('High')
  })

  it('keeps the template decision when the enricher times out', async () => {
    const seen: { signal?: AbortSignal } = {}
    const slow = enricher((_, signal) => {
      seen.signal = signal
      return new Promise<Enrichment>(() => undefined)
    })
    const out = await enrichDecision(decision, slow, 20)
    expect(out).toBe(decision)
    expect(seen.signal?.aborted).toBe(true)
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('keeps the template decision when the enricher fails', async () => {
    const out = await enrichDecision(
      decision,
      enricher(async () => {
        throw new Error('model offline')
      }),
      1000
    )
    expect(out).toBe(decision)
  })

  it('keeps the template decision on an empty answer', async () => {
    const out = await enrichDecision(decision, enricher(async () => ({ explanation: '' })), 1000)
    expect(out).toBe(decision)
  })

  it('returns the template decision untouched for the default enricher', async () => {
    expect(await enrichDecision(decision, templateEnricher, 1000)).toBe(decision)
    expect(console.warn).not.toHaveBeenCalled()
  })
})

describe('createLlmEnricher', () => {
  it('reads explanation and action from the model answer', async () => {
    chat.mockImplementation(() => {
      async function* gen() {
        yield { message: { content: 'Here you go: {"explanation": "Short version.", ' } }
        yield { message: { content: '"recommended_action": "Call the client CFO"}' } }
      }
      return gen()
    })
    const out = await enrichDecision(decision, createLlmEnricher({ model: 'llama3.2', retries: 0 }), 1000)
    expect(out.explanation).toBe('Short version.')
    expect(out.recommendedAction).toBe('Call the client CFO')
    expect(chat).toHaveBeenCalledTimes(1)
  })

  it('falls back when the model is unreachable', async () => {
    chat.mockRejectedValue(new Error('connect ECONNREFUSED'))
    const out = await enrichDecision(decision, createLlmEnricher({ retries: 0 }), 1000)
    expect(out).toBe(decision)
  })
})
