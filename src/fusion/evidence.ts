import { ScenarioSimulation } from './types'

// Shared readings of the raw records used by the evidence-based strategies.

export type ParentStatusClass = 'bankruptcy' | 'restructuring' | 'stable' | 'other'

export function classifyParentStatus(status: string): ParentStatusClass {
  const lower = status.toLowerCase()
  if (lower.includes('bankruptcy') || lower.includes('chapter 11')) return 'bankruptcy'
  if (lower.includes('restructuring')) return 'restructuring'
  if (lower.includes('stable')) return 'stable'
  return 'other'
}

/**
 * The risk scenario has the largest absolute cash-flow impact, the safe one the
 * smallest. On ties the earlier scenario in input order is kept, so with a
 * single scenario (or identical impacts) both can be the same id.
 */
export function riskAndSafeScenarios(scenarios: ScenarioSimulation[]): { risk: string; safe: string } {
  let risk = scenarios[0]
  let safe = scenarios[0]
  for (const s of scenarios) {
    if (Math.abs(s.cashFlowImpact) > Math.abs(risk.cashFlowImpact)) risk = s
    if (Math.abs(s.cashFlowImpact) < Math.abs(safe.cashFlowImpact)) safe = s
  }
  return { risk: risk.scenarioId, safe: safe.scenarioId }
}

/** Cash-flow stability, margin preservation and simulation confidence blended 0.5 / 0.3 / 0.2. */
export function simulationScore(s: ScenarioSimulation): number {
  const cashFlow = 1 - Math.abs(s.cashFlowImpact) / 100
  const margin = 1 - Math.abs(s.marginImpact) / 100
  return cashFlow * 0.5 + margin * 0.3 + s.probability * 0.2
}
