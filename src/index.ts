export * from './fusion/types'
export * from './fusion/errors'
export type { FusionConfig, FusionConfigInput, PresetName, StrategyWeights } from './fusion/config'
export {
  createFusionConfig,
  defaultConfig,
  parsePresetName,
  presetConfig,
  presets,
  validateConfig,
  withoutStrategy
} from './fusion/config'
export type { ParsedFusionRequest } from './fusion/parse'
export { parseFusionInput } from './fusion/parse'
export { validateFusionInput } from './fusion/validate'
export { aggregateSources } from './fusion/aggregate'
export { detectWeakSignals } from './fusion/weakSignals'
export { runWeighted, weightedStrategy } from './fusion/weighted'
export type { EvidenceSource, MassFunction } from './fusion/dempsterShafer'
export {
  belief,
  buildDstEvidence,
  combineMasses,
  combineSources,
  dempsterShaferStrategy,
  discountMass,
  massFunction,
  pignisticTransform,
  plausibility,
  runDempsterShafer
} from './fusion/dempsterShafer'
export type { BayesianEvidence } from './fusion/bayesian'
export {
  bayesUpdate,
  bayesianStrategy,
  buildBayesianEvidence,
  klDivergence,
  runBayesian,
  shannonEntropy
} from './fusion/bayesian'
export type { FusionContext, FusionStrategy } from './fusion/strategy'
export { combineStrategies } from './fusion/metaFusion'
export { assembleDecision, serializeDecision } from './fusion/assembler'
export type { FusionRun } from './fusion/engine'
export { runFusion, synthesize, synthesizeWithFallback } from './fusion/engine'
export type { Enrichment, ExplanationEnricher } from './enrichment/enrich'
export { createLlmEnricher, enrichDecision, templateEnricher } from './enrichment/enrich'
export { loadScenariosFromFile, loadScenariosFromText } from './csv'
