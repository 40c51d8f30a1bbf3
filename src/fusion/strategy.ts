import { FusionConfig } from './config'
import { FusionInput, StrategyName, StrategyResult, WeakSignal } from './types'

export interface FusionContext extends FusionInput {
  weakSignals: WeakSignal[]
  config: FusionConfig
}

/** One fusion algorithm behind the common contract used by meta-fusion. */
export interface FusionStrategy<R extends StrategyResult = StrategyResult> {
  name: StrategyName
  run(ctx: FusionContext): R
}
