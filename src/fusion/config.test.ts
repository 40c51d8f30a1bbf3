import { describe, expect, it } from 'vitest'
import {
  createFusionConfig,
  defaultConfig,
  parsePresetName,
  presetConfig,
  validateConfig,
  withoutStrategy
} from './config'
import { ConfigurationError } from './errors'

describe('createFusionConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createFusionConfig()).toEqual({
      riskWeight: 0.6,
      profitabilityWeight: 0.4,
      strategyWeights: { weighted: 0.3, dst: 0.4, bayesian: 0.3 }
    })
  })

  it('hands out a fresh copy of the defaults on every call', () => {
    const first = createFusionConfig()
    first.riskWeight = 0.9
    first.strategyWeights.dst = 0
    expect(createFusionConfig().riskWeight).toBe(0.6)
    expect(createFusionConfig().strategyWeights.dst).toBe(0.4)
    expect(defaultConfig.strategyWeights.dst).toBe(0.4)
  })

  it('derives the profitability weight from a lone risk weight', () => {
    const cfg = createFusionConfig({ riskWeight: 0.7 })
    expect(cfg.profitabilityWeight).toBeCloseTo(0.3, 12)
    expect(cfg.strategyWeights).toEqual(defaultConfig.strategyWeights)
  })

  it('merges partial strategy weights over the defaults', () => {
    const cfg = createFusionConfig({ strategyWeights: { weighted: 0.2, dst: 0.5 } })
    expect(cfg.strategyWeights).toEqual({ weighted: 0.2, dst: 0.5, bayesian: 0.3 })
  })

  it('rejects weights that do not sum to 1', () => {
    expect(() => createFusionConfig({ riskWeight: 0.7, profitabilityWeight: 0.4 })).toThrow(ConfigurationError)
    expect(() => createFusionConfig({ strategyWeights: { weighted: 0.5 } })).toThrow(/strategy weights must sum to 1/)
  })

  it('rejects negative and non-finite weights', () => {
    expect(() => createFusionConfig({ riskWeight: -0.1, profitabilityWeight: 1.1 })).toThrow(ConfigurationError)
    expect(() => validateConfig({ ...defaultConfig, riskWeight: Number.NaN })).toThrow(/finite/)
  })
})

describe('presets', () => {
  it('parses names case-insensitively', () => {
    expect(parsePresetName(' Crisis ')).toBe('crisis')
  })

  it('rejects unknown presets with the offending field', () => {
    try {
      parsePresetName('reckless')
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError)
      if (e instanceof ConfigurationError) expect(e.field).toBe('preset')
    }
  })

  it('fixes the risk and profitability weights', () => {
    const cfg = presetConfig('aggressive', { riskWeight: 0.9, strategyWeights: { weighted: 0.5, dst: 0.25, bayesian: 0.25 } })
    expect(cfg.riskWeight).toBe(0.3)
    expect(cfg.profitabilityWeight).toBe(0.7)
    expect(cfg.strategyWeights.weighted).toBe(0.5)
  })
})

describe('withoutStrategy', () => {
  it('zeroes one strategy and renormalizes the rest', () => {
    const cfg = withoutStrategy(defaultConfig, 'dst')
    expect(cfg.strategyWeights).toEqual({ weighted: 0.5, dst: 0, bayesian: 0.5 })
  })

  it('refuses to remove the only weighted strategy', () => {
    const onlyDst = createFusionConfig({ strategyWeights: { weighted: 0, dst: 1, bayesian: 0 } })
    expect(() => withoutStrategy(onlyDst, 'dst')).toThrow(ConfigurationError)
  })
})
