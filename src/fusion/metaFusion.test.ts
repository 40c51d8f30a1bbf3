import { describe, expect, it } from 'vitest'
import {
  calmFinancial,
  calmKg,
  financial,
  kg,
  scenarios,
  strainedFinancial,
  strainedKg,
  threeScenarios
} from '../../test/fixtures/example'
import { buildBayesianEvidence, runBayesian } from './bayesian'
import { buildDstEvidence, runDempsterShafer } from './dempsterShafer'
import { InvalidInputError } from './errors'
import { combineStrategies } from './metaFusion'
import { FinancialData, KnowledgeGraphContext, ScoreMap, WeightedResult } from './types'
import { detectWeakSignals } from './weakSignals'
import { runWeighted } from './weighted'

function weightedResult(pick: string, scores: ScoreMap): WeightedResult {
  return {
    strategy: 'weighted',
    recommendedScenarioId: pick,
    scorePerScenario: scores,
    diagnostics: { riskWeight: 0.6, profitabilityWeight: 0.4, criticalBoostApplied: false, fusionScores: scores, finalScores: scores }
  }
}

function runAll(fin: FinancialData, context: KnowledgeGraphContext) {
  return [
    runWeighted(threeScenarios, detectWeakSignals(fin, context)),
    runDempsterShafer(threeScenarios, buildDstEvidence(fin, context, threeScenarios)),
    runBayesian(threeScenarios, buildBayesianEvidence(fin, context, threeScenarios))
  ]
}

describe('combineStrategies', () => {
  const results = [
    runWeighted(scenarios, detectWeakSignals(financial, kg)),
    runDempsterShafer(scenarios, buildDstEvidence(financial, kg, scenarios)),
    runBayesian(scenarios, buildBayesianEvidence(financial, kg, scenarios))
  ]

  it('reaches a weighted consensus and reports partial agreement', () => {
    const meta = combineStrategies(results, scenarios)
    expect(meta.recommendedScenarioId).toBe('A')
    expect(meta.consensusScores.A).toBeCloseTo(0.776055, 5)
    expect(meta.consensusScores.A + meta.consensusScores.B).toBeCloseTo(1, 12)
    expect(meta.confidence).toBe(meta.consensusScores.A)
    expect(meta.agreementLevel).toBeCloseTo(2 / 3, 12)
    expect(meta.breakdown.weighted?.scenarioId).toBe('B')
    expect(meta.breakdown.weighted?.score).toBeCloseTo(0.891 / 1.605, 10)
    expect(meta.breakdown.dst?.scenarioId).toBe('A')
    expect(meta.breakdown.bayesian?.scenarioId).toBe('A')
  })

  it('lets the strategy weights decide', () => {
    const meta = combineStrategies(results, scenarios, { weighted: 1, dst: 0, bayesian: 0 })
    expect(meta.recommendedScenarioId).toBe('B')
    expect(meta.agreementLevel).toBeCloseTo(1 / 3, 12)
  })

  it('renormalizes over the strategies present', () => {
    const meta = combineStrategies(
      [weightedResult('A', { A: 0.6, B: 0.4 })],
      scenarios,
      { weighted: 0.3, dst: 0.4, bayesian: 0.3 }
    )
    expect(meta.consensusScores.A).toBeCloseTo(0.6, 12)
    expect(meta.agreementLevel).toBe(1)
    expect(meta.breakdown).toEqual({ weighted: { scenarioId: 'A', score: 0.6 } })
  })

  it('breaks consensus ties on the shorter horizon', () => {
    const meta = combineStrategies([weightedResult('A', { A: 0.5, B: 0.5 })], scenarios)
    expect(meta.recommendedScenarioId).toBe('B')
    expect(meta.agreementLevel).toBe(0)
  })

  it('needs at least one weighted result', () => {
    expect(() => combineStrategies([], scenarios)).toThrow(InvalidInputError)
    expect(() =>
      combineStrategies([weightedResult('A', { A: 1, B: 0 })], scenarios, { weighted: 0, dst: 0.5, bayesian: 0.5 })
    ).toThrow(InvalidInputError)
  })
})

describe('combineStrategies over three scenarios', () => {
  it('reports one-third agreement when every strategy picks a different scenario', () => {
    const meta = combineStrategies(runAll(strainedFinancial, strainedKg), threeScenarios)
    expect(meta.recommendedScenarioId).toBe('P')
    expect(meta.breakdown.weighted?.scenarioId).toBe('R')
    expect(meta.breakdown.dst?.scenarioId).toBe('Q')
    expect(meta.breakdown.bayesian?.scenarioId).toBe('P')
    expect(meta.agreementLevel).toBeCloseTo(1 / 3, 12)
    expect(meta.consensusScores.P).toBeCloseTo(0.449308, 5)
    expect(meta.consensusScores.Q).toBeCloseTo(0.351822, 5)
    expect(meta.consensusScores.R).toBeCloseTo(0.198869, 5)
    expect(meta.consensusScores.P + meta.consensusScores.Q + meta.consensusScores.R).toBeCloseTo(1, 12)
  })

  it('reports two-thirds agreement when one strategy dissents', () => {
    const meta = combineStrategies(runAll(calmFinancial, calmKg), threeScenarios)
    expect(meta.recommendedScenarioId).toBe('Q')
    expect(meta.breakdown.weighted?.scenarioId).toBe('R')
    expect(meta.agreementLevel).toBeCloseTo(2 / 3, 12)
    expect(meta.consensusScores.Q).toBeCloseTo(0.676187, 5)
  })
})
