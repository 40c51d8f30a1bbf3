import { financialStressScore } from './aggregate'
import { STRATEGY_NAMES, thresholds } from './config'
import { InvalidInputError } from './errors'
import { rankScenarios } from './ranking'
import {
  FinancialData,
  FusedDecision,
  FusedDecisionJson,
  KnowledgeGraphContext,
  MetaFusionResult,
  ScenarioSimulation,
  StrategyName,
  StrategyResult,
  TacticalPriority,
  WeakSignal,
  WeakSignalType
} from './types'
import { dominantSignal, hasCriticalSignal } from './weakSignals'

export interface AssemblyDetail {
  financial?: FinancialData
  kg?: KnowledgeGraphContext
  strategies?: StrategyResult[]
}

const SIGNAL_LABELS: Record<WeakSignalType, string> = {
  ProductionClientSystemicRisk: 'production-client systemic risk',
  BudgetLiquiditySqueeze: 'budget liquidity squeeze',
  HistoricalPatternRecurrence: 'historical pattern recurrence'
}

export const STRATEGY_LABELS: Record<StrategyName, string> = {
  weighted: 'Weighted Average',
  dst: 'Dempster-Shafer',
  bayesian: 'Bayesian'
}

const pct = (x: number) => `${Math.round(x * 100)}%`

export function conflictBand(conflict: number): 'Low' | 'Moderate' | 'High' {
  if (conflict < 0.3) return 'Low'
  if (conflict < 0.6) return 'Moderate'
  return 'High'
}

export function tacticalPriority(weakSignals: WeakSignal[], winner: ScenarioSimulation): TacticalPriority {
  const impact = Math.abs(winner.cashFlowImpact)
  if (hasCriticalSignal(weakSignals) || weakSignals.length >= 2 || impact > thresholds.highPriorityCashFlow) return 'High'
  if (weakSignals.length === 1 || impact >= thresholds.mediumPriorityCashFlow) return 'Medium'
  return 'Low'
}

export function recommendedAction(winner: ScenarioSimulation, weakSignals: WeakSignal[], clientId?: string): string {
  const client = clientId ? `Client ${clientId}` : 'the client'
  const desc = winner.description.toLowerCase()
  let action: string
  if (desc.includes('early payment')) action = `Trigger early payment incentive for ${client}`
  else if (desc.includes('renegotiat')) action = `Initiate payment term renegotiation with ${client}`
  else if (desc.includes('hedg') || desc.includes('insurance')) action = `Activate hedging/insurance strategy for ${client}`
  else if (desc.includes('business as usual')) action = `Maintain current operations for ${client} (monitor closely)`
  else action = `Execute ${winner.scenarioId}: ${winner.description}`

  const dominant = dominantSignal(weakSignals)
  if (dominant) action += ` to contain the ${SIGNAL_LABELS[dominant.signalType]} (${dominant.riskLevel})`
  return action
}

function strategyLines(meta: MetaFusionResult, strategies?: StrategyResult[]): string[] {
  if (strategies && strategies.length > 0) {
    return strategies.map((r) => {
      const score = (r.scorePerScenario[r.recommendedScenarioId] ?? 0).toFixed(3)
      let line = `- ${STRATEGY_LABELS[r.strategy]}: recommends ${r.recommendedScenarioId} (score ${score})`
      if (r.strategy === 'dst') {
        line += `; inter-source conflict ${pct(r.diagnostics.conflict)} (${conflictBand(r.diagnostics.conflict)})`
      } else if (r.strategy === 'bayesian') {
        line += `; posterior entropy ${r.diagnostics.entropy.toFixed(3)} nats, KL divergence ${r.diagnostics.klDivergence.toFixed(3)}`
      }
      return line
    })
  }
  const lines: string[] = []
  for (const name of STRATEGY_NAMES) {
    const pick = meta.breakdown[name]
    if (pick) lines.push(`- ${STRATEGY_LABELS[name]}: recommends ${pick.scenarioId} (score ${pick.score.toFixed(3)})`)
  }
  return lines
}

function consensusNote(meta: MetaFusionResult): string {
  if (meta.agreementLevel >= 1) return 'Consensus: all strategies converge on the same scenario.'
  const divergent: string[] = []
  for (const name of STRATEGY_NAMES) {
    const pick = meta.breakdown[name]
    if (pick && pick.scenarioId !== meta.recommendedScenarioId) divergent.push(`${STRATEGY_LABELS[name]} prefers ${pick.scenarioId}`)
  }
  if (meta.agreementLevel > 0.5) return `Consensus: majority agreement with divergence (${divergent.join('; ')}).`
  return `Consensus warning: strategies disagree (${divergent.join('; ')}); decided by weighted meta-fusion vote.`
}

function financialContext(financial: FinancialData): string {
  const change = financial.productionOutputChange
  const production = change < 0 ? `a ${Math.abs(change)}% production slowdown` : `a ${change}% production change`
  const client = financial.clientId ? `Client ${financial.clientId}` : 'The client'
  return (
    `Financial context: ${client} shows a ${financial.unpaidInvoicesSpike}% spike in unpaid invoices, ${production} ` +
    `and ${financial.budgetRemainingQ3}% of the Q3 budget remaining (stress score ${financialStressScore(financial).toFixed(2)}).`
  )
}

function scenarioComparison(winner: ScenarioSimulation, scenarios: ScenarioSimulation[]): string | undefined {
  const others = scenarios.filter((s) => s.scenarioId !== winner.scenarioId)
  if (others.length === 0) return undefined
  const worst = others.reduce((a, b) => (Math.abs(b.cashFlowImpact) > Math.abs(a.cashFlowImpact) ? b : a))
  if (Math.abs(worst.cashFlowImpact) <= Math.abs(winner.cashFlowImpact)) {
    return (
      `Scenario comparison: ${winner.scenarioId} carries the largest cash flow impact ` +
      `(${Math.abs(winner.cashFlowImpact)}%) with ${Math.abs(winner.marginImpact)}% margin impact.`
    )
  }
  return (
    `Scenario comparison: ${winner.scenarioId} avoids the ${Math.abs(worst.cashFlowImpact)}% cash flow deficit ` +
    `predicted in ${worst.scenarioId}, with ${Math.abs(winner.marginImpact)}% margin impact.`
  )
}

export function buildExplanation(
  meta: MetaFusionResult,
  winner: ScenarioSimulation,
  weakSignals: WeakSignal[],
  scenarios: ScenarioSimulation[],
  detail: AssemblyDetail = {}
): string {
  const strategyCount = detail.strategies?.length ?? STRATEGY_NAMES.filter((n) => meta.breakdown[n]).length
  const parts: string[] = [
    `${winner.scenarioId} (${winner.description}) selected by meta-fusion with ${pct(meta.agreementLevel)} agreement ` +
      `across ${strategyCount} strategies (confidence ${pct(meta.confidence)}).`,
    ['Strategy analysis:', ...strategyLines(meta, detail.strategies)].join('\n')
  ]
  if (detail.financial) parts.push(financialContext(detail.financial))
  const pattern = detail.kg?.similarHistoricalPattern
  if (detail.kg && pattern) {
    parts.push(
      `Historical pattern: episodic memory matches an incident from ${pattern.yearsAgo} years ago ` +
        `that caused a ${pattern.delayDays}-day cash flow delay. Client parent status: ${detail.kg.clientParentStatus}.`
    )
  }
  const comparison = scenarioComparison(winner, scenarios)
  if (comparison) parts.push(comparison)
  parts.push(consensusNote(meta))
  if (weakSignals.length > 0) {
    const names = weakSignals.map((s) => `${SIGNAL_LABELS[s.signalType]} (${s.riskLevel})`).join(', ')
    parts.push(`Weak signals: ${weakSignals.length} detected: ${names}.`)
  }
  return parts.join('\n\n')
}

/** Map the consensus and the weak signals to a prioritized, explainable decision. */
export function assembleDecision(
  meta: MetaFusionResult,
  weakSignals: WeakSignal[],
  scenarios: ScenarioSimulation[],
  detail: AssemblyDetail = {}
): FusedDecision {
  const winner = scenarios.find((s) => s.scenarioId === meta.recommendedScenarioId)
  if (!winner) {
    throw new InvalidInputError(
      `Recommended scenario '${meta.recommendedScenarioId}' is not among the scenarios`,
      'recommendedScenarioId',
      meta.recommendedScenarioId
    )
  }

  return {
    tacticalPriority: tacticalPriority(weakSignals, winner),
    recommendedAction: recommendedAction(winner, weakSignals, detail.financial?.clientId),
    explanation: buildExplanation(meta, winner, weakSignals, scenarios, detail),
    weakSignalAlert: weakSignals,
    predictedFinancialOutcome: {
      cashFlowImpactPct: winner.cashFlowImpact,
      marginImpactPct: winner.marginImpact,
      timeToImpactDays: winner.timeHorizonDays,
      probability: winner.probability
    },
    confidenceScore: meta.confidence,
    metaFusion: meta,
    alternativeActions: rankScenarios(meta.consensusScores, scenarios)
      .filter((s) => s.scenarioId !== winner.scenarioId)
      .map((s) => s.description)
  }
}

export function serializeDecision(decision: FusedDecision): FusedDecisionJson {
  const breakdown: FusedDecisionJson['meta_fusion']['breakdown'] = {}
  for (const name of STRATEGY_NAMES) {
    const pick = decision.metaFusion.breakdown[name]
    if (pick) breakdown[name] = { scenario_id: pick.scenarioId, score: pick.score }
  }
  return {
    tactical_priority: decision.tacticalPriority,
    recommended_action: decision.recommendedAction,
    explanation: decision.explanation,
    weak_signal_alert: decision.weakSignalAlert.map((s) => ({
      signal_type: s.signalType,
      correlation_strength: s.correlationStrength,
      source_indices: [...s.sourceIndices],
      risk_level: s.riskLevel,
      description: s.description
    })),
    predicted_financial_outcome: {
      cash_flow_impact_pct: decision.predictedFinancialOutcome.cashFlowImpactPct,
      margin_impact_pct: decision.predictedFinancialOutcome.marginImpactPct,
      time_to_impact_days: decision.predictedFinancialOutcome.timeToImpactDays,
      probability: decision.predictedFinancialOutcome.probability
    },
    confidence_score: decision.confidenceScore,
    meta_fusion: {
      recommended_scenario_id: decision.metaFusion.recommendedScenarioId,
      confidence: decision.metaFusion.confidence,
      agreement_level: decision.metaFusion.agreementLevel,
      breakdown
    },
    alternative_actions: [...decision.alternativeActions]
  }
}
