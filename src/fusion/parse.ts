import { FusionConfigInput, PresetName, StrategyWeights, parsePresetName } from './config'
import { ConfigurationError, InvalidInputError } from './errors'
import { FinancialData, FusionInput, HistoricalPattern, KnowledgeGraphContext, ScenarioSimulation } from './types'

// Reads the snake_case wire format produced by the upstream collaborators.

type JsonObject = Record<string, unknown>

export interface ParsedFusionRequest extends FusionInput {
  preset?: PresetName
  config?: FusionConfigInput
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function objectAt(value: unknown, field: string): JsonObject {
  if (!isObject(value)) throw new InvalidInputError(`${field} must be an object`, field, value)
  return value
}

function numberAt(obj: JsonObject, key: string, field: string): number {
  const value = obj[key]
  if (typeof value !== 'number') throw new InvalidInputError(`${field}.${key} must be a number`, `${field}.${key}`, value)
  return value
}

function optionalNumberAt(obj: JsonObject, key: string, field: string): number | undefined {
  if (obj[key] === undefined) return undefined
  return numberAt(obj, key, field)
}

function stringAt(obj: JsonObject, key: string, field: string, fallback?: string): string {
  const value = obj[key]
  if (value === undefined && fallback !== undefined) return fallback
  if (typeof value !== 'string') throw new InvalidInputError(`${field}.${key} must be a string`, `${field}.${key}`, value)
  return value
}

function stringListAt(obj: JsonObject, key: string, field: string): string[] {
  const value = obj[key]
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) throw new InvalidInputError(`${field}.${key} must be a list`, `${field}.${key}`, value)
  // descriptors are opaque: keep strings, stringify anything else
  return value.map((v) => (typeof v === 'string' ? v : JSON.stringify(v)))
}

export function parseFinancialData(raw: unknown, field = 'financial'): FinancialData {
  const obj = objectAt(raw, field)
  return {
    unpaidInvoicesSpike: numberAt(obj, 'unpaid_invoices_spike', field),
    clientId: stringAt(obj, 'client_id', field, ''),
    productionOutputChange: numberAt(obj, 'production_output_change', field),
    budgetRemainingQ3: numberAt(obj, 'budget_remaining_q3', field)
  }
}

function parsePattern(raw: unknown, field: string): HistoricalPattern | null {
  if (raw === undefined || raw === null) return null
  const obj = objectAt(raw, field)
  // older feeds call the delay `cash_flow_delay_days`
  const delayKey = obj.delay_days === undefined && obj.cash_flow_delay_days !== undefined ? 'cash_flow_delay_days' : 'delay_days'
  return {
    yearsAgo: numberAt(obj, 'years_ago', field),
    delayDays: numberAt(obj, delayKey, field)
  }
}

export function parseKnowledgeGraph(raw: unknown, field = 'knowledge_graph'): KnowledgeGraphContext {
  const obj = objectAt(raw, field)
  return {
    clientParentStatus: stringAt(obj, 'client_parent_status', field, ''),
    similarHistoricalPattern: parsePattern(obj.similar_historical_pattern, `${field}.similar_historical_pattern`),
    externalDataSignals: stringListAt(obj, 'external_data_signals', field),
    riskIndicators: stringListAt(obj, 'risk_indicators', field)
  }
}

export function parseScenario(raw: unknown, field: string): ScenarioSimulation {
  const obj = objectAt(raw, field)
  return {
    scenarioId: stringAt(obj, 'scenario_id', field),
    description: stringAt(obj, 'description', field, ''),
    cashFlowImpact: numberAt(obj, 'cash_flow_impact', field),
    marginImpact: numberAt(obj, 'margin_impact', field),
    probability: numberAt(obj, 'probability', field),
    timeHorizonDays: numberAt(obj, 'time_horizon_days', field)
  }
}

export function parseScenarios(raw: unknown, field = 'scenarios'): ScenarioSimulation[] {
  if (!Array.isArray(raw)) throw new InvalidInputError(`${field} must be a list`, field, raw)
  return raw.map((s, i) => parseScenario(s, `${field}[${i}]`))
}

function parseConfig(raw: unknown): { preset?: PresetName; config?: FusionConfigInput } {
  if (raw === undefined || raw === null) return {}
  if (!isObject(raw)) throw new ConfigurationError('config must be an object', 'config', raw)
  const preset = typeof raw.preset === 'string' ? parsePresetName(raw.preset) : undefined
  const config: FusionConfigInput = {}
  const risk = optionalNumberAt(raw, 'risk_weight', 'config')
  const profit = optionalNumberAt(raw, 'profitability_weight', 'config')
  if (risk !== undefined) config.riskWeight = risk
  if (profit !== undefined) config.profitabilityWeight = profit
  if (raw.strategy_weights !== undefined) {
    const sw = objectAt(raw.strategy_weights, 'config.strategy_weights')
    const weights: Partial<StrategyWeights> = {}
    for (const name of ['weighted', 'dst', 'bayesian'] as const) {
      const w = optionalNumberAt(sw, name, 'config.strategy_weights')
      if (w !== undefined) weights[name] = w
    }
    config.strategyWeights = weights
  }
  return { preset, config }
}

/**
 * Parse a request document `{ financial, knowledge_graph, scenarios, config? }`.
 * Range checks happen later, in validateFusionInput.
 */
export function parseFusionInput(raw: unknown): ParsedFusionRequest {
  const obj = objectAt(raw, 'input')
  return {
    financial: parseFinancialData(obj.financial),
    kg: parseKnowledgeGraph(obj.knowledge_graph ?? {}),
    scenarios: parseScenarios(obj.scenarios ?? []),
    ...parseConfig(obj.config)
  }
}
