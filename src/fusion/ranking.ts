import { InvalidInputError } from './errors'
import { ScenarioSimulation, ScoreMap } from './types'

/** Scale scores to sum to 1; all-zero (or negative) totals become uniform. */
export function normalizeScores(raw: ScoreMap, ids: string[]): ScoreMap {
  const total = ids.reduce((acc, id) => acc + (raw[id] ?? 0), 0)
  const out: ScoreMap = {}
  for (const id of ids) out[id] = total > 0 ? (raw[id] ?? 0) / total : 1 / ids.length
  return out
}

export function compareByHorizonThenId(a: ScenarioSimulation, b: ScenarioSimulation): number {
  if (a.timeHorizonDays !== b.timeHorizonDays) return a.timeHorizonDays - b.timeHorizonDays
  return a.scenarioId < b.scenarioId ? -1 : a.scenarioId > b.scenarioId ? 1 : 0
}

/**
 * Order scenarios by score, highest first. Equal scores go to the shorter time
 * horizon, then to the lexicographically smaller id.
 */
export function rankScenarios(scores: ScoreMap, scenarios: ScenarioSimulation[]): ScenarioSimulation[] {
  return [...scenarios].sort((a, b) => {
    const diff = (scores[b.scenarioId] ?? 0) - (scores[a.scenarioId] ?? 0)
    if (diff !== 0) return diff
    return compareByHorizonThenId(a, b)
  })
}

export function pickWinner(scores: ScoreMap, scenarios: ScenarioSimulation[]): ScenarioSimulation {
  const [winner] = rankScenarios(scores, scenarios)
  if (!winner) throw new InvalidInputError('At least one scenario is required', 'scenarios', scenarios)
  return winner
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}
