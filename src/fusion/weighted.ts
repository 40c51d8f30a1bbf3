import { defaultConfig, thresholds } from './config'
import { clamp, normalizeScores, pickWinner } from './ranking'
import { FusionStrategy } from './strategy'
import { ScenarioSimulation, ScoreMap, WeakSignal, WeightedResult } from './types'
import { hasCriticalSignal } from './weakSignals'

/** Risk weight after the critical-signal boost, capped at 0.8. */
export function effectiveRiskWeight(baseRiskWeight: number, weakSignals: WeakSignal[]): number {
  if (!hasCriticalSignal(weakSignals)) return baseRiskWeight
  return Math.min(baseRiskWeight + thresholds.criticalRiskWeightBoost, thresholds.maxBoostedRiskWeight)
}

export function runWeighted(
  scenarios: ScenarioSimulation[],
  weakSignals: WeakSignal[],
  baseRiskWeight = defaultConfig.riskWeight
): WeightedResult {
  const criticalBoostApplied = hasCriticalSignal(weakSignals)
  const riskWeight = effectiveRiskWeight(baseRiskWeight, weakSignals)
  const profitabilityWeight = 1 - riskWeight

  const fusionScores: ScoreMap = {}
  const finalScores: ScoreMap = {}
  for (const s of scenarios) {
    const riskScore = clamp(1 - Math.abs(s.cashFlowImpact) / 100, 0, 1)
    const profitScore = clamp(1 - Math.abs(s.marginImpact) / 100, 0, 1)
    const fusion = riskWeight * riskScore + profitabilityWeight * profitScore
    fusionScores[s.scenarioId] = fusion
    finalScores[s.scenarioId] = fusion * s.probability
  }

  const winner = pickWinner(finalScores, scenarios)
  return {
    strategy: 'weighted',
    recommendedScenarioId: winner.scenarioId,
    scorePerScenario: normalizeScores(
      finalScores,
      scenarios.map((s) => s.scenarioId)
    ),
    diagnostics: {
      riskWeight,
      profitabilityWeight,
      criticalBoostApplied,
      fusionScores,
      finalScores
    }
  }
}

export const weightedStrategy: FusionStrategy<WeightedResult> = {
  name: 'weighted',
  run: (ctx) => runWeighted(ctx.scenarios, ctx.weakSignals, ctx.config.riskWeight)
}
