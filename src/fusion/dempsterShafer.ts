/**
 * Dempster-Shafer evidence fusion over the frame of scenario ids.
 *
 * Each evidence source is a simple support function: mass on the scenario(s)
 * it favours, the rest on the whole frame (ignorance). Sources are discounted by
 * reliability and combined pairwise with Dempster's rule.
 */

import { debug } from '../logger'
import { FusionConflictError, InvalidInputError } from './errors'
import { classifyParentStatus, riskAndSafeScenarios, simulationScore } from './evidence'
import { compareByHorizonThenId, normalizeScores } from './ranking'
import { FusionStrategy } from './strategy'
import { DstResult, FinancialData, KnowledgeGraphContext, ScenarioSimulation, ScoreMap } from './types'

export interface FocalElement {
  members: string[] // sorted, unique
  mass: number
}

export type MassFunction = Map<string, FocalElement>

export interface EvidenceSource {
  name: string
  mass: MassFunction
  reliability: number // [0,1]
}

export interface Combination {
  mass: MassFunction
  conflict: number
}

const MASS_TOLERANCE = 1e-6
const TOTAL_CONFLICT = 1 - 1e-10
const SIMULATION_SUPPORT = 0.8

export function focalKey(members: Iterable<string>): string {
  return JSON.stringify([...new Set(members)].sort())
}

function addMass(target: MassFunction, members: Iterable<string>, mass: number) {
  const sorted = [...new Set(members)].sort()
  const key = JSON.stringify(sorted)
  const existing = target.get(key)
  if (existing) target.set(key, { members: sorted, mass: existing.mass + mass })
  else target.set(key, { members: sorted, mass })
}

/** Build a mass function; entries naming the same set are summed. */
export function massFunction(entries: Array<[Iterable<string>, number]>): MassFunction {
  const m: MassFunction = new Map()
  for (const [members, mass] of entries) addMass(m, members, mass)
  return m
}

export function totalMass(m: MassFunction): number {
  let total = 0
  for (const f of m.values()) total += f.mass
  return total
}

export function validateSource(source: EvidenceSource, frame: ReadonlySet<string>) {
  const field = `evidence.${source.name}`
  if (!Number.isFinite(source.reliability) || source.reliability < 0 || source.reliability > 1) {
    throw new InvalidInputError(`${field}.reliability must be within [0, 1]`, `${field}.reliability`, source.reliability)
  }
  for (const f of source.mass.values()) {
    if (!Number.isFinite(f.mass) || f.mass < 0) {
      throw new InvalidInputError(`${field} assigns an invalid mass to ${JSON.stringify(f.members)}`, field, f.mass)
    }
    if (f.members.length === 0 || f.members.some((m) => !frame.has(m))) {
      throw new InvalidInputError(`${field} has a focal set outside the frame: ${JSON.stringify(f.members)}`, field, f.members)
    }
  }
  const total = totalMass(source.mass)
  if (Math.abs(total - 1) > MASS_TOLERANCE) {
    throw new InvalidInputError(`${field} masses sum to ${total.toFixed(6)}, expected 1`, field, total)
  }
}

/**
 * Shafer discounting: m'(A) = α·m(A) for A ≠ Θ, m'(Θ) = 1 − α·(1 − m(Θ)).
 */
export function discountMass(m: MassFunction, reliability: number, frame: string[]): MassFunction {
  if (reliability >= 1) return new Map(m)
  const thetaKey = focalKey(frame)
  const out: MassFunction = new Map()
  let thetaMass = 0
  for (const [key, f] of m) {
    if (key === thetaKey) thetaMass += f.mass
    else addMass(out, f.members, reliability * f.mass)
  }
  addMass(out, frame, 1 - reliability * (1 - thetaMass))
  return out
}

/**
 * Dempster's rule: m12(A) = Σ_{B∩C=A} m1(B)·m2(C) / (1 − K), with K the mass of
 * empty intersections. K = 1 raises FusionConflictError.
 */
export function combineMasses(m1: MassFunction, m2: MassFunction, operands: [string, string] = ['m1', 'm2']): Combination {
  const joint: MassFunction = new Map()
  let conflict = 0
  for (const a of m1.values()) {
    for (const b of m2.values()) {
      const product = a.mass * b.mass
      if (product === 0) continue
      const bSet = new Set(b.members)
      const intersection = a.members.filter((x) => bSet.has(x))
      if (intersection.length === 0) conflict += product
      else addMass(joint, intersection, product)
    }
  }
  conflict = Math.min(1, Math.max(0, conflict))
  if (conflict >= TOTAL_CONFLICT) throw new FusionConflictError(conflict, operands)

  const norm = 1 / (1 - conflict)
  const mass: MassFunction = new Map()
  for (const [key, f] of joint) mass.set(key, { members: f.members, mass: f.mass * norm })
  return { mass, conflict }
}

/** Discount then fold all sources left to right. No sources yields the vacuous mass function. */
export function combineSources(
  sources: EvidenceSource[],
  frame: string[]
): { mass: MassFunction; conflict: number; maxConflict: number } {
  if (sources.length === 0) return { mass: massFunction([[frame, 1]]), conflict: 0, maxConflict: 0 }

  let mass = discountMass(sources[0].mass, sources[0].reliability, frame)
  let label = sources[0].name
  let conflict = 0
  let maxConflict = 0
  for (const source of sources.slice(1)) {
    const step = combineMasses(mass, discountMass(source.mass, source.reliability, frame), [label, source.name])
    mass = step.mass
    conflict = step.conflict
    maxConflict = Math.max(maxConflict, step.conflict)
    label = `${label}+${source.name}`
    debug('dst combine', source.name, 'K =', step.conflict)
  }
  return { mass, conflict, maxConflict }
}

/** Bel(A) = Σ m(B) over non-empty B ⊆ A. */
export function belief(m: MassFunction, hypothesis: ReadonlySet<string>): number {
  let total = 0
  for (const f of m.values()) {
    if (f.members.length > 0 && f.members.every((x) => hypothesis.has(x))) total += f.mass
  }
  return total
}

/** Pl(A) = Σ m(B) over B with B ∩ A ≠ ∅. */
export function plausibility(m: MassFunction, hypothesis: ReadonlySet<string>): number {
  let total = 0
  for (const f of m.values()) {
    if (f.members.some((x) => hypothesis.has(x))) total += f.mass
  }
  return total
}

/** BetP(x) = Σ m(A)/|A| over A ∋ x, normalized over the frame. */
export function pignisticTransform(m: MassFunction, frame: string[]): ScoreMap {
  const bet: ScoreMap = {}
  for (const id of frame) bet[id] = 0
  for (const f of m.values()) {
    const share = f.mass / f.members.length
    for (const x of f.members) if (x in bet) bet[x] += share
  }
  return normalizeScores(bet, frame)
}

// ─── Evidence builders ────────────────────────────────────────────────────────

function simpleSupport(
  name: string,
  reliability: number,
  frame: string[],
  risk: string,
  safe: string,
  riskMass: number,
  safeMass: number
): EvidenceSource {
  return {
    name,
    reliability,
    mass: massFunction([
      [[risk], riskMass],
      [[safe], safeMass],
      [frame, Math.max(0, 1 - riskMass - safeMass)]
    ])
  }
}

function invoiceMasses(spike: number): [number, number] {
  if (spike > 20) return [0.7, 0.05]
  if (spike > 10) return [0.5, 0.1]
  if (spike > 5) return [0.3, 0.2]
  return [0.1, 0.4]
}

function productionMasses(change: number): [number, number] {
  if (change < -15) return [0.6, 0.05]
  if (change < -8) return [0.4, 0.1]
  if (change < -3) return [0.25, 0.2]
  return [0.05, 0.45]
}

function budgetMasses(remaining: number): [number, number] {
  if (remaining < 5) return [0.65, 0.05]
  if (remaining < 10) return [0.45, 0.1]
  if (remaining < 20) return [0.25, 0.25]
  return [0.1, 0.4]
}

function knowledgeGraphMasses(kg: KnowledgeGraphContext): [number, number] {
  let risk = 0.1
  let safe = 0.3
  switch (classifyParentStatus(kg.clientParentStatus)) {
    case 'bankruptcy':
      risk += 0.35
      safe -= 0.15
      break
    case 'restructuring':
      risk += 0.25
      safe -= 0.1
      break
    case 'stable':
      safe += 0.15
      break
    case 'other':
      break
  }
  if (kg.similarHistoricalPattern) {
    risk += 0.15
    safe -= 0.05
  }
  return [Math.max(0, Math.min(risk, 0.8)), Math.max(0, Math.min(safe, 0.8))]
}

function simulationSource(scenarios: ScenarioSimulation[], frame: string[]): EvidenceSource {
  const scores: ScoreMap = {}
  for (const s of scenarios) scores[s.scenarioId] = Math.max(0.01, simulationScore(s))
  const normalized = normalizeScores(scores, frame)
  const entries: Array<[string[], number]> = scenarios.map((s) => [[s.scenarioId], normalized[s.scenarioId] * SIMULATION_SUPPORT])
  entries.push([frame, 1 - SIMULATION_SUPPORT])
  return { name: 'Scenario_Simulation_Evidence', reliability: 0.7, mass: massFunction(entries) }
}

/** Evidence sources, in combination order: invoices, production, budget, knowledge graph, simulation. */
export function buildDstEvidence(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[]
): EvidenceSource[] {
  const frame = scenarios.map((s) => s.scenarioId)
  const { risk, safe } = riskAndSafeScenarios(scenarios)
  return [
    simpleSupport('ERP_Invoice_Evidence', 0.85, frame, risk, safe, ...invoiceMasses(financial.unpaidInvoicesSpike)),
    simpleSupport('IoT_Production_Evidence', 0.75, frame, risk, safe, ...productionMasses(financial.productionOutputChange)),
    simpleSupport('ERP_Budget_Evidence', 0.9, frame, risk, safe, ...budgetMasses(financial.budgetRemainingQ3)),
    simpleSupport('KnowledgeGraph_Evidence', 0.8, frame, risk, safe, ...knowledgeGraphMasses(kg)),
    simulationSource(scenarios, frame)
  ]
}

// ─── Strategy ────────────────────────────────────────────────────────────────

export function runDempsterShafer(scenarios: ScenarioSimulation[], sources: EvidenceSource[]): DstResult {
  if (scenarios.length === 0) throw new InvalidInputError('At least one scenario is required', 'scenarios', scenarios)
  const frame = scenarios.map((s) => s.scenarioId)
  const frameSet = new Set(frame)
  for (const source of sources) validateSource(source, frameSet)

  const { mass, conflict, maxConflict } = combineSources(sources, frame)

  const bel: ScoreMap = {}
  const pl: ScoreMap = {}
  const gap: ScoreMap = {}
  for (const id of frame) {
    const singleton = new Set([id])
    bel[id] = belief(mass, singleton)
    pl[id] = plausibility(mass, singleton)
    gap[id] = pl[id] - bel[id]
  }

  const [winner] = [...scenarios].sort((a, b) => {
    const byBelief = bel[b.scenarioId] - bel[a.scenarioId]
    if (byBelief !== 0) return byBelief
    const byPlausibility = pl[b.scenarioId] - pl[a.scenarioId]
    if (byPlausibility !== 0) return byPlausibility
    return compareByHorizonThenId(a, b)
  })

  return {
    strategy: 'dst',
    recommendedScenarioId: winner.scenarioId,
    scorePerScenario: normalizeScores(bel, frame),
    diagnostics: {
      conflict,
      maxConflict,
      belief: bel,
      plausibility: pl,
      uncertaintyGap: gap,
      pignistic: pignisticTransform(mass, frame),
      sources: sources.map((s) => s.name)
    }
  }
}

export const dempsterShaferStrategy: FusionStrategy<DstResult> = {
  name: 'dst',
  run: (ctx) => runDempsterShafer(ctx.scenarios, buildDstEvidence(ctx.financial, ctx.kg, ctx.scenarios))
}
