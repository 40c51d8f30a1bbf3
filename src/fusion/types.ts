// Signal model shared by the detector, the strategies and the assembler

export type RiskLevel = 'Low' | 'Medium' | 'High' | 'Critical'

export type TacticalPriority = 'High' | 'Medium' | 'Low'

export type WeakSignalType = 'ProductionClientSystemicRisk' | 'BudgetLiquiditySqueeze' | 'HistoricalPatternRecurrence'

export type StrategyName = 'weighted' | 'dst' | 'bayesian'

export interface FinancialData {
  unpaidInvoicesSpike: number // signed %
  clientId: string
  productionOutputChange: number // signed %, negative = slowdown
  budgetRemainingQ3: number // [0,100] %
}

export interface HistoricalPattern {
  yearsAgo: number
  delayDays: number
}

export interface KnowledgeGraphContext {
  clientParentStatus: string
  similarHistoricalPattern?: HistoricalPattern | null
  externalDataSignals: string[]
  riskIndicators: string[]
}

export interface ScenarioSimulation {
  scenarioId: string
  description: string
  cashFlowImpact: number // signed %, negative is worse
  marginImpact: number // signed %, negative is worse
  probability: number // [0,1]
  timeHorizonDays: number
}

export interface WeakSignal {
  signalType: WeakSignalType
  correlationStrength: number // [0,1]
  sourceIndices: string[]
  riskLevel: RiskLevel
  description: string
}

export type ScoreMap = Record<string, number>

export interface WeightedDiagnostics {
  riskWeight: number
  profitabilityWeight: number
  criticalBoostApplied: boolean
  fusionScores: ScoreMap // before multiplying by probability
  finalScores: ScoreMap
}

export interface DstDiagnostics {
  conflict: number // K of the last pairwise combination
  maxConflict: number
  belief: ScoreMap
  plausibility: ScoreMap
  uncertaintyGap: ScoreMap // plausibility - belief
  pignistic: ScoreMap
  sources: string[]
}

export interface BayesianDiagnostics {
  entropy: number
  klDivergence: number
  bayesFactor: number | null // winner vs runner-up
  bayesFactors: ScoreMap
  logLikelihood: number
  prior: ScoreMap
  evidenceTrail: ScoreMap[]
}

interface StrategyResultBase {
  recommendedScenarioId: string
  scorePerScenario: ScoreMap
}

export type WeightedResult = StrategyResultBase & { strategy: 'weighted'; diagnostics: WeightedDiagnostics }
export type DstResult = StrategyResultBase & { strategy: 'dst'; diagnostics: DstDiagnostics }
export type BayesianResult = StrategyResultBase & { strategy: 'bayesian'; diagnostics: BayesianDiagnostics }

export type StrategyResult = WeightedResult | DstResult | BayesianResult

export interface StrategyPick {
  scenarioId: string
  score: number
}

export interface MetaFusionResult {
  recommendedScenarioId: string
  confidence: number
  agreementLevel: number
  consensusScores: ScoreMap
  breakdown: Partial<Record<StrategyName, StrategyPick>>
}

export interface PredictedOutcome {
  cashFlowImpactPct: number
  marginImpactPct: number
  timeToImpactDays: number
  probability: number
}

export interface FusedDecision {
  tacticalPriority: TacticalPriority
  recommendedAction: string
  explanation: string
  weakSignalAlert: WeakSignal[]
  predictedFinancialOutcome: PredictedOutcome
  confidenceScore: number
  metaFusion: MetaFusionResult
  alternativeActions: string[]
}

export interface SourceAggregation {
  financialStressScore: number
  historicalPatternMatch: boolean
  externalRiskFactors: number
  scenarioRiskRange: { minCashFlowImpact: number; maxCashFlowImpact: number; range: number }
  productionFinanceCorrelation: number
}

export interface FusionInput {
  financial: FinancialData
  kg: KnowledgeGraphContext
  scenarios: ScenarioSimulation[]
}

// Serialized shapes (snake_case keys of the wire format)

export interface WeakSignalJson {
  signal_type: WeakSignalType
  correlation_strength: number
  source_indices: string[]
  risk_level: RiskLevel
  description: string
}

export interface FusedDecisionJson {
  tactical_priority: TacticalPriority
  recommended_action: string
  explanation: string
  weak_signal_alert: WeakSignalJson[]
  predicted_financial_outcome: {
    cash_flow_impact_pct: number
    margin_impact_pct: number
    time_to_impact_days: number
    probability: number
  }
  confidence_score: number
  meta_fusion: {
    recommended_scenario_id: string
    confidence: number
    agreement_level: number
    breakdown: Partial<Record<StrategyName, { scenario_id: string; score: number }>>
  }
  alternative_actions: string[]
}
