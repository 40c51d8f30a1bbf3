import { ConfigurationError } from './errors'
import { StrategyName } from './types'

export interface StrategyWeights {
  weighted: number
  dst: number
  bayesian: number
}

export interface FusionConfig {
  riskWeight: number
  profitabilityWeight: number
  strategyWeights: StrategyWeights
}

export type FusionConfigInput = Partial<Omit<FusionConfig, 'strategyWeights'>> & {
  strategyWeights?: Partial<StrategyWeights>
}

export type PresetName = 'crisis' | 'conservative' | 'balanced' | 'aggressive'

export const WEIGHT_TOLERANCE = 1e-6

// Detector and weighted-strategy thresholds. Static for every call.
export const thresholds = {
  productionSlowdown: -5,
  productionStrengthScale: 20,
  highStrengthCutoff: 0.6,
  budgetCritical: 10,
  budgetSqueezeStrength: 0.8,
  historicalPatternStrength: 0.75,
  criticalRiskWeightBoost: 0.2,
  maxBoostedRiskWeight: 0.8,
  highPriorityCashFlow: 15,
  mediumPriorityCashFlow: 5
} as const

export const defaultConfig: FusionConfig = {
  riskWeight: 0.6,
  profitabilityWeight: 0.4,
  strategyWeights: {
    weighted: 0.3,
    dst: 0.4,
    bayesian: 0.3
  }
}

export const presets: Record<PresetName, { riskWeight: number; profitabilityWeight: number; useWhen: string }> = {
  crisis: { riskWeight: 0.9, profitabilityWeight: 0.1, useWhen: 'liquidity emergency' },
  conservative: { riskWeight: 0.8, profitabilityWeight: 0.2, useWhen: 'financial stability is paramount' },
  balanced: { riskWeight: 0.5, profitabilityWeight: 0.5, useWhen: 'normal operating conditions' },
  aggressive: { riskWeight: 0.3, profitabilityWeight: 0.7, useWhen: 'growth phase with a strong cash position' }
}

export const STRATEGY_NAMES: StrategyName[] = ['weighted', 'dst', 'bayesian']

function checkUnitWeight(field: string, value: number) {
  if (!Number.isFinite(value)) throw new ConfigurationError(`${field} must be a finite number`, field, value)
  if (value < 0) throw new ConfigurationError(`${field} must not be negative`, field, value)
  if (value > 1) throw new ConfigurationError(`${field} must not exceed 1`, field, value)
}

export function validateConfig(cfg: FusionConfig): FusionConfig {
  checkUnitWeight('riskWeight', cfg.riskWeight)
  checkUnitWeight('profitabilityWeight', cfg.profitabilityWeight)
  const pair = cfg.riskWeight + cfg.profitabilityWeight
  if (Math.abs(pair - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(
      `riskWeight (${cfg.riskWeight}) and profitabilityWeight (${cfg.profitabilityWeight}) must sum to 1`,
      'profitabilityWeight',
      cfg.profitabilityWeight
    )
  }

  let total = 0
  for (const name of STRATEGY_NAMES) {
    checkUnitWeight(`strategyWeights.${name}`, cfg.strategyWeights[name])
    total += cfg.strategyWeights[name]
  }
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`strategy weights must sum to 1, got ${total}`, 'strategyWeights', cfg.strategyWeights)
  }
  return cfg
}

/** Merge a partial config over the defaults, then validate the result. */
export function createFusionConfig(partial?: FusionConfigInput): FusionConfig {
  if (!partial) return { ...defaultConfig, strategyWeights: { ...defaultConfig.strategyWeights } }
  const riskWeight = partial.riskWeight ?? defaultConfig.riskWeight
  // a lone riskWeight implies its complement
  const profitabilityWeight =
    partial.profitabilityWeight ?? (partial.riskWeight !== undefined ? 1 - riskWeight : defaultConfig.profitabilityWeight)
  return validateConfig({
    riskWeight,
    profitabilityWeight,
    strategyWeights: partial.strategyWeights
      ? { ...defaultConfig.strategyWeights, ...partial.strategyWeights }
      : { ...defaultConfig.strategyWeights }
  })
}

export function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(presets, value)
}

export function parsePresetName(value: string): PresetName {
  const name = value.trim().toLowerCase()
  if (!isPresetName(name)) {
    throw new ConfigurationError(
      `Unknown preset '${value}' (expected one of ${Object.keys(presets).join(', ')})`,
      'preset',
      value
    )
  }
  return name
}

export function presetConfig(name: PresetName, overrides?: FusionConfigInput): FusionConfig {
  const preset = presets[name]
  return createFusionConfig({
    ...overrides,
    riskWeight: preset.riskWeight,
    profitabilityWeight: preset.profitabilityWeight
  })
}

/** Zero one strategy's weight and renormalize the rest so they still sum to 1. */
export function withoutStrategy(cfg: FusionConfig, strategy: StrategyName): FusionConfig {
  const remaining = STRATEGY_NAMES.filter((n) => n !== strategy)
  const total = remaining.reduce((acc, n) => acc + cfg.strategyWeights[n], 0)
  if (total <= 0) {
    throw new ConfigurationError(`No strategy weight left after removing '${strategy}'`, 'strategyWeights', cfg.strategyWeights)
  }
  const strategyWeights: StrategyWeights = { weighted: 0, dst: 0, bayesian: 0 }
  for (const n of remaining) strategyWeights[n] = cfg.strategyWeights[n] / total
  return validateConfig({ ...cfg, strategyWeights })
}

export default defaultConfig
