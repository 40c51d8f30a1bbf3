import { scoped } from '../logger'
import { aggregateSources } from './aggregate'
import { assembleDecision } from './assembler'
import { bayesianStrategy } from './bayesian'
import { FusionConfig, defaultConfig, validateConfig, withoutStrategy } from './config'
import { dempsterShaferStrategy } from './dempsterShafer'
import { FusionConflictError } from './errors'
import { combineStrategies } from './metaFusion'
import { FusionContext, FusionStrategy } from './strategy'
import {
  FinancialData,
  FusedDecision,
  KnowledgeGraphContext,
  MetaFusionResult,
  ScenarioSimulation,
  SourceAggregation,
  StrategyResult,
  WeakSignal
} from './types'
import { validateFusionInput } from './validate'
import { detectWeakSignals } from './weakSignals'
import { weightedStrategy } from './weighted'

const log = scoped('fusion')

export const strategies: FusionStrategy[] = [weightedStrategy, dempsterShaferStrategy, bayesianStrategy]

export interface FusionRun {
  decision: FusedDecision
  weakSignals: WeakSignal[]
  strategies: StrategyResult[]
  meta: MetaFusionResult
  aggregation: SourceAggregation
}

export function runFusion(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[],
  config: FusionConfig = defaultConfig
): FusionRun {
  validateFusionInput(financial, kg, scenarios)
  validateConfig(config)

  const weakSignals = detectWeakSignals(financial, kg)
  const ctx: FusionContext = { financial, kg, scenarios, weakSignals, config }

  // a zero-weight strategy contributes nothing to the vote, so it is not run
  const results = strategies.filter((s) => config.strategyWeights[s.name] > 0).map((s) => s.run(ctx))
  const meta = combineStrategies(results, scenarios, config.strategyWeights)

  return {
    decision: assembleDecision(meta, weakSignals, scenarios, { financial, kg, strategies: results }),
    weakSignals,
    strategies: results,
    meta,
    aggregation: aggregateSources(financial, kg, scenarios)
  }
}

/** Fuse one snapshot into a decision. Pure and synchronous: same input, same output. */
export function synthesize(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[],
  config: FusionConfig = defaultConfig
): FusedDecision {
  return runFusion(financial, kg, scenarios, config).decision
}

/** Like runFusion, but reruns without Dempster-Shafer when its evidence is in total conflict. */
export function synthesizeWithFallback(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[],
  config: FusionConfig = defaultConfig
): FusionRun {
  try {
    return runFusion(financial, kg, scenarios, config)
  } catch (e) {
    if (!(e instanceof FusionConflictError)) throw e
    log.warn(`${e.message}; retrying without Dempster-Shafer`)
    return runFusion(financial, kg, scenarios, withoutStrategy(config, 'dst'))
  }
}
