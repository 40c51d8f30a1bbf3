import { StrategyWeights, defaultConfig } from './config'
import { InvalidInputError } from './errors'
import { pickWinner } from './ranking'
import { MetaFusionResult, ScenarioSimulation, ScoreMap, StrategyPick, StrategyResult } from './types'

/**
 * Weighted vote across strategy results. Consensus score per scenario is the
 * weighted sum of each strategy's score, divided by the weight of the strategies
 * actually present (1 when all three ran). Disagreement is reported through
 * `agreementLevel`, never resolved by forcing a pick.
 */
export function combineStrategies(
  results: StrategyResult[],
  scenarios: ScenarioSimulation[],
  strategyWeights: StrategyWeights = defaultConfig.strategyWeights
): MetaFusionResult {
  if (results.length === 0) throw new InvalidInputError('Meta-fusion needs at least one strategy result', 'results', results)

  const totalWeight = results.reduce((acc, r) => acc + strategyWeights[r.strategy], 0)
  if (!(totalWeight > 0)) {
    throw new InvalidInputError('Strategies present in meta-fusion carry no weight', 'strategyWeights', strategyWeights)
  }

  const consensusScores: ScoreMap = {}
  for (const s of scenarios) {
    let sum = 0
    for (const r of results) sum += strategyWeights[r.strategy] * (r.scorePerScenario[s.scenarioId] ?? 0)
    consensusScores[s.scenarioId] = sum / totalWeight
  }

  const winner = pickWinner(consensusScores, scenarios).scenarioId
  const agreeing = results.filter((r) => r.recommendedScenarioId === winner).length

  const breakdown: MetaFusionResult['breakdown'] = {}
  for (const r of results) {
    const pick: StrategyPick = {
      scenarioId: r.recommendedScenarioId,
      score: r.scorePerScenario[r.recommendedScenarioId] ?? 0
    }
    breakdown[r.strategy] = pick
  }

  return {
    recommendedScenarioId: winner,
    confidence: consensusScores[winner],
    agreementLevel: agreeing / results.length,
    consensusScores,
    breakdown
  }
}
