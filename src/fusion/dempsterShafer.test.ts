import { describe, expect, it } from 'vitest'
import {
  financial,
  kg,
  scenarios,
  singleScenario,
  strainedFinancial,
  strainedKg,
  threeScenarios
} from '../../test/fixtures/example'
import {
  belief,
  buildDstEvidence,
  combineMasses,
  combineSources,
  discountMass,
  focalKey,
  massFunction,
  pignisticTransform,
  plausibility,
  runDempsterShafer,
  totalMass
} from './dempsterShafer'
import { FusionConflictError, InvalidInputError } from './errors'

const frame = ['A', 'B']

function massOf(m: ReturnType<typeof massFunction>, members: string[]): number {
  return m.get(focalKey(members))?.mass ?? 0
}

describe('mass functions', () => {
  it('sums entries that name the same set', () => {
    const m = massFunction([
      [['B', 'A'], 0.25],
      [['A', 'B'], 0.25],
      [['A'], 0.5]
    ])
    expect(m.size).toBe(2)
    expect(massOf(m, frame)).toBe(0.5)
    expect(totalMass(m)).toBe(1)
  })

  it('discounts towards ignorance', () => {
    const m = discountMass(
      massFunction([
        [['A'], 0.6],
        [frame, 0.4]
      ]),
      0.5,
      frame
    )
    expect(massOf(m, ['A'])).toBeCloseTo(0.3, 12)
    expect(massOf(m, frame)).toBeCloseTo(0.7, 12)
  })
})

describe('combineMasses', () => {
  const m1 = massFunction([
    [['A'], 0.6],
    [frame, 0.4]
  ])
  const m2 = massFunction([
    [['B'], 0.5],
    [frame, 0.5]
  ])

  it('applies the normalized conjunctive rule', () => {
    const { mass, conflict } = combineMasses(m1, m2)
    expect(conflict).toBeCloseTo(0.3, 12)
    expect(massOf(mass, ['A'])).toBeCloseTo(0.3 / 0.7, 12)
    expect(massOf(mass, ['B'])).toBeCloseTo(0.2 / 0.7, 12)
    expect(massOf(mass, frame)).toBeCloseTo(0.2 / 0.7, 12)
    expect(totalMass(mass)).toBeCloseTo(1, 12)
  })

  it('derives belief, plausibility and the pignistic distribution', () => {
    const { mass } = combineMasses(m1, m2)
    const a = new Set(['A'])
    expect(belief(mass, a)).toBeCloseTo(3 / 7, 12)
    expect(plausibility(mass, a)).toBeCloseTo(5 / 7, 12)
    const bet = pignisticTransform(mass, frame)
    expect(bet.A).toBeCloseTo(4 / 7, 12)
    expect(bet.B).toBeCloseTo(3 / 7, 12)
  })

  it('raises FusionConflictError on total conflict', () => {
    const onlyA = massFunction([[['A'], 1]])
    const onlyB = massFunction([[['B'], 1]])
    expect(() => combineMasses(onlyA, onlyB)).toThrow(FusionConflictError)
  })

  it('names both operands when sources contradict each other', () => {
    const sources = [
      { name: 'left', reliability: 1, mass: massFunction([[['A'], 1]]) },
      { name: 'right', reliability: 1, mass: massFunction([[['B'], 1]]) }
    ]
    try {
      combineSources(sources, frame)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(FusionConflictError)
      if (e instanceof FusionConflictError) {
        expect(e.operands).toEqual(['left', 'right'])
        expect(e.conflict).toBe(1)
      }
    }
  })

  it('returns the vacuous mass function when there is no evidence', () => {
    const { mass, conflict } = combineSources([], frame)
    expect(massOf(mass, frame)).toBe(1)
    expect(conflict).toBe(0)
  })
})

describe('runDempsterShafer', () => {
  it('favours the risk-mitigating scenario on the distressed example', () => {
    const result = runDempsterShafer(scenarios, buildDstEvidence(financial, kg, scenarios))
    const { belief: bel, plausibility: pl, conflict, maxConflict } = result.diagnostics
    expect(result.recommendedScenarioId).toBe('A')
    expect(bel.A).toBeCloseTo(0.80847, 4)
    expect(bel.B).toBeCloseTo(0.13225, 4)
    expect(pl.A).toBeCloseTo(0.86775, 4)
    expect(result.scorePerScenario.A).toBeCloseTo(0.85941, 4)
    expect(result.scorePerScenario.A + result.scorePerScenario.B).toBeCloseTo(1, 12)
    expect(conflict).toBeCloseTo(0.262544, 5)
    expect(maxConflict).toBeGreaterThanOrEqual(conflict)
    for (const id of ['A', 'B']) expect(bel[id]).toBeLessThanOrEqual(pl[id])
  })

  it('combines over a three-scenario frame', () => {
    const result = runDempsterShafer(threeScenarios, buildDstEvidence(strainedFinancial, strainedKg, threeScenarios))
    const { belief: bel, plausibility: pl, conflict, pignistic } = result.diagnostics
    expect(result.recommendedScenarioId).toBe('Q')
    expect(bel.P).toBeCloseTo(0.387176, 5)
    expect(bel.Q).toBeCloseTo(0.446634, 5)
    expect(bel.R).toBeCloseTo(0.052192, 5)
    expect(pl.R).toBeCloseTo(0.16619, 5)
    expect(conflict).toBeCloseTo(0.312343, 5)
    expect(result.scorePerScenario.Q).toBeCloseTo(0.5041, 4)
    expect(result.scorePerScenario.P + result.scorePerScenario.Q + result.scorePerScenario.R).toBeCloseTo(1, 12)
    expect(pignistic.P + pignistic.Q + pignistic.R).toBeCloseTo(1, 12)
    for (const id of ['P', 'Q', 'R']) expect(bel[id]).toBeLessThanOrEqual(pl[id])
  })

  it('builds the five sources in combination order', () => {
    expect(buildDstEvidence(financial, kg, scenarios).map((s) => [s.name, s.reliability])).toEqual([
      ['ERP_Invoice_Evidence', 0.85],
      ['IoT_Production_Evidence', 0.75],
      ['ERP_Budget_Evidence', 0.9],
      ['KnowledgeGraph_Evidence', 0.8],
      ['Scenario_Simulation_Evidence', 0.7]
    ])
  })

  it('gives a single scenario full belief without conflict', () => {
    const result = runDempsterShafer(singleScenario, buildDstEvidence(financial, kg, singleScenario))
    expect(result.recommendedScenarioId).toBe('S')
    expect(result.scorePerScenario).toEqual({ S: 1 })
    expect(result.diagnostics.conflict).toBe(0)
  })

  it('rejects sources whose masses do not sum to 1', () => {
    const source = { name: 'short', reliability: 0.9, mass: massFunction([[['A'], 0.5]]) }
    expect(() => runDempsterShafer(scenarios, [source])).toThrow(InvalidInputError)
  })

  it('rejects focal sets outside the frame', () => {
    const source = { name: 'stray', reliability: 0.9, mass: massFunction([[['Z'], 1]]) }
    expect(() => runDempsterShafer(scenarios, [source])).toThrow(/outside the frame/)
  })
})
