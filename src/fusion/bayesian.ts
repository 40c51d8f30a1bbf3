import { debug } from '../logger'
import { InvalidInputError } from './errors'
import { classifyParentStatus, riskAndSafeScenarios, simulationScore } from './evidence'
import { clamp, normalizeScores, pickWinner, rankScenarios } from './ranking'
import { FusionStrategy } from './strategy'
import { BayesianResult, FinancialData, KnowledgeGraphContext, ScenarioSimulation, ScoreMap } from './types'

export interface BayesianEvidence {
  name: string
  likelihoods: ScoreMap // P(evidence | scenario), [0,1]
  weight: number // tempering exponent, [0,1]
}

const NON_INFORMATIVE = 0.5
const LIKELIHOOD_FLOOR = 0.05
const LIKELIHOOD_CEILING = 0.95

function likelihoodOf(evidence: BayesianEvidence, id: string): number {
  return evidence.likelihoods[id] ?? NON_INFORMATIVE
}

export function validateEvidence(evidence: BayesianEvidence) {
  const field = `evidence.${evidence.name}`
  if (!Number.isFinite(evidence.weight) || evidence.weight < 0 || evidence.weight > 1) {
    throw new InvalidInputError(`${field}.weight must be within [0, 1]`, `${field}.weight`, evidence.weight)
  }
  for (const [id, l] of Object.entries(evidence.likelihoods)) {
    if (!Number.isFinite(l) || l < 0 || l > 1) {
      throw new InvalidInputError(`Likelihood for '${id}' in ${evidence.name} is ${l}, must be in [0, 1]`, field, l)
    }
  }
}

/** One step of Bayes' rule with a tempered likelihood L^w, renormalized. */
export function bayesUpdate(current: ScoreMap, evidence: BayesianEvidence, ids: string[]): ScoreMap {
  const unnormalized: ScoreMap = {}
  for (const id of ids) {
    const l = likelihoodOf(evidence, id)
    const tempered = evidence.weight < 1 ? Math.pow(l, evidence.weight) : l
    unnormalized[id] = (current[id] ?? 0) * tempered
  }
  return normalizeScores(unnormalized, ids)
}

/** Shannon entropy in nats: 0 for certainty, ln(n) for a uniform posterior. */
export function shannonEntropy(dist: ScoreMap): number {
  let h = 0
  for (const p of Object.values(dist)) if (p > 0) h -= p * Math.log(p)
  return h
}

/** KL(posterior ‖ prior) in nats. */
export function klDivergence(posterior: ScoreMap, prior: ScoreMap): number {
  let kl = 0
  for (const [id, p] of Object.entries(posterior)) {
    const q = prior[id] ?? 0
    if (p > 0 && q > 0) kl += p * Math.log(p / q)
  }
  return kl
}

/** Posterior odds over prior odds of `best` against `alt`. */
export function bayesFactor(posterior: ScoreMap, prior: ScoreMap, best: string, alt: string): number {
  const postAlt = posterior[alt]
  const priorBest = prior[best]
  if (!(postAlt > 0) || !(priorBest > 0)) return Number.POSITIVE_INFINITY
  const priorOdds = prior[alt] > 0 ? priorBest / prior[alt] : 1
  return posterior[best] / postAlt / priorOdds
}

// ─── Evidence builders ────────────────────────────────────────────────────────

function likelihoods(
  ids: string[],
  risk: string,
  safe: string,
  values: { risk: number; safe: number; other: number }
): ScoreMap {
  // signed inputs can push the linear mappings past either end
  const out: ScoreMap = {}
  for (const id of ids) {
    const value = id === risk ? values.risk : id === safe ? values.safe : values.other
    out[id] = clamp(value, LIKELIHOOD_FLOOR, LIKELIHOOD_CEILING)
  }
  return out
}

function knowledgeGraphRisk(kg: KnowledgeGraphContext): number {
  const byStatus = { bankruptcy: 0.85, restructuring: 0.65, stable: 0.2, other: 0.4 }
  const base = byStatus[classifyParentStatus(kg.clientParentStatus)]
  return kg.similarHistoricalPattern ? Math.min(0.95, base + 0.15) : base
}

/**
 * Evidence in update order: invoices, production, budget, knowledge graph,
 * then the simulation scores themselves.
 */
export function buildBayesianEvidence(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[]
): BayesianEvidence[] {
  const ids = scenarios.map((s) => s.scenarioId)
  const { risk, safe } = riskAndSafeScenarios(scenarios)
  const spike = financial.unpaidInvoicesSpike
  const change = financial.productionOutputChange
  const budget = financial.budgetRemainingQ3
  const kgRisk = knowledgeGraphRisk(kg)

  const simulation: ScoreMap = {}
  for (const s of scenarios) simulation[s.scenarioId] = clamp(simulationScore(s), LIKELIHOOD_FLOOR, LIKELIHOOD_CEILING)

  return [
    {
      name: 'ERP_Invoice_Likelihood',
      weight: 0.85,
      likelihoods: likelihoods(ids, risk, safe, {
        risk: Math.min(0.95, 0.3 + spike / 30),
        safe: Math.max(0.05, 0.8 - spike / 25),
        other: Math.max(0.1, 0.5 - spike / 50)
      })
    },
    {
      name: 'IoT_Production_Likelihood',
      weight: 0.75,
      likelihoods: likelihoods(ids, risk, safe, {
        risk: Math.min(0.9, 0.3 + Math.abs(change) / 25),
        safe: Math.max(0.1, 0.7 + change / 30),
        other: 0.4
      })
    },
    {
      name: 'ERP_Budget_Likelihood',
      weight: 0.9,
      likelihoods: likelihoods(ids, risk, safe, {
        risk: Math.min(0.9, 0.2 + (100 - budget) / 120),
        safe: Math.max(0.05, budget / 120),
        other: 0.35
      })
    },
    {
      name: 'KnowledgeGraph_Likelihood',
      weight: 0.8,
      likelihoods: likelihoods(ids, risk, safe, { risk: kgRisk, safe: 1 - kgRisk, other: 0.4 })
    },
    { name: 'Scenario_Simulation_Likelihood', weight: 0.7, likelihoods: simulation }
  ]
}

// ─── Strategy ────────────────────────────────────────────────────────────────

export function runBayesian(
  scenarios: ScenarioSimulation[],
  evidence: BayesianEvidence[],
  prior?: ScoreMap
): BayesianResult {
  const ids = scenarios.map((s) => s.scenarioId)
  const start = prior ? normalizeScores(prior, ids) : normalizeScores({}, ids)
  for (const e of evidence) validateEvidence(e)

  let current = start
  let logLikelihood = 0
  const evidenceTrail: ScoreMap[] = [start]
  for (const e of evidence) {
    for (const id of ids) {
      const l = likelihoodOf(e, id)
      if (l > 0) logLikelihood += Math.log(l) * current[id]
    }
    current = bayesUpdate(current, e, ids)
    evidenceTrail.push(current)
    debug('bayes update', e.name, current)
  }

  const ranked = rankScenarios(current, scenarios)
  const winner = pickWinner(current, scenarios).scenarioId
  const bayesFactors: ScoreMap = {}
  for (const s of ranked.slice(1)) bayesFactors[s.scenarioId] = bayesFactor(current, start, winner, s.scenarioId)

  return {
    strategy: 'bayesian',
    recommendedScenarioId: winner,
    scorePerScenario: current,
    diagnostics: {
      entropy: shannonEntropy(current),
      klDivergence: klDivergence(current, start),
      bayesFactor: ranked.length > 1 ? bayesFactors[ranked[1].scenarioId] : null,
      bayesFactors,
      logLikelihood,
      prior: start,
      evidenceTrail
    }
  }
}

export const bayesianStrategy: FusionStrategy<BayesianResult> = {
  name: 'bayesian',
  run: (ctx) => runBayesian(ctx.scenarios, buildBayesianEvidence(ctx.financial, ctx.kg, ctx.scenarios))
}
