import { InvalidInputError } from './errors'
import { FinancialData, KnowledgeGraphContext, ScenarioSimulation } from './types'

function finite(field: string, value: number) {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a finite number`, field, value)
  }
}

function within(field: string, value: number, min: number, max: number) {
  finite(field, value)
  if (value < min || value > max) {
    throw new InvalidInputError(`${field} must be within [${min}, ${max}], got ${value}`, field, value)
  }
}

export function validateFinancialData(financial: FinancialData) {
  finite('financial.unpaidInvoicesSpike', financial.unpaidInvoicesSpike)
  finite('financial.productionOutputChange', financial.productionOutputChange)
  within('financial.budgetRemainingQ3', financial.budgetRemainingQ3, 0, 100)
  if (typeof financial.clientId !== 'string') {
    throw new InvalidInputError('financial.clientId must be a string', 'financial.clientId', financial.clientId)
  }
}

export function validateKnowledgeGraph(kg: KnowledgeGraphContext) {
  if (typeof kg.clientParentStatus !== 'string') {
    throw new InvalidInputError('kg.clientParentStatus must be a string', 'kg.clientParentStatus', kg.clientParentStatus)
  }
  const pattern = kg.similarHistoricalPattern
  if (pattern) {
    for (const [key, value] of [
      ['yearsAgo', pattern.yearsAgo],
      ['delayDays', pattern.delayDays]
    ] as const) {
      const field = `kg.similarHistoricalPattern.${key}`
      finite(field, value)
      if (!Number.isInteger(value) || value < 0) {
        throw new InvalidInputError(`${field} must be a non-negative integer`, field, value)
      }
    }
  }
}

export function validateScenarios(scenarios: ScenarioSimulation[]) {
  if (!Array.isArray(scenarios) || scenarios.length === 0) {
    throw new InvalidInputError('At least one scenario is required', 'scenarios', scenarios)
  }
  const seen = new Set<string>()
  scenarios.forEach((s, i) => {
    const at = `scenarios[${i}]`
    if (typeof s.scenarioId !== 'string' || s.scenarioId.trim() === '') {
      throw new InvalidInputError(`${at}.scenarioId must be a non-empty string`, `${at}.scenarioId`, s.scenarioId)
    }
    if (seen.has(s.scenarioId)) {
      throw new InvalidInputError(`Duplicate scenarioId '${s.scenarioId}'`, `${at}.scenarioId`, s.scenarioId)
    }
    seen.add(s.scenarioId)
    finite(`${at}.cashFlowImpact`, s.cashFlowImpact)
    finite(`${at}.marginImpact`, s.marginImpact)
    within(`${at}.probability`, s.probability, 0, 1)
    finite(`${at}.timeHorizonDays`, s.timeHorizonDays)
    if (!Number.isInteger(s.timeHorizonDays) || s.timeHorizonDays <= 0) {
      throw new InvalidInputError(
        `${at}.timeHorizonDays must be a positive integer`,
        `${at}.timeHorizonDays`,
        s.timeHorizonDays
      )
    }
  })
}

export function validateFusionInput(financial: FinancialData, kg: KnowledgeGraphContext, scenarios: ScenarioSimulation[]) {
  validateScenarios(scenarios)
  validateFinancialData(financial)
  validateKnowledgeGraph(kg)
}
