import { clamp } from './ranking'
import { FinancialData, KnowledgeGraphContext, ScenarioSimulation, SourceAggregation } from './types'

export function financialStressScore(financial: FinancialData): number {
  const invoice = clamp(financial.unpaidInvoicesSpike / 100, 0, 1)
  const budget = 1 - financial.budgetRemainingQ3 / 100
  const production = Math.min(Math.abs(financial.productionOutputChange) / 50, 1)
  return invoice * 0.4 + budget * 0.3 + production * 0.3
}

// slowdown together with an invoice spike
export function productionFinanceCorrelation(productionChange: number, invoiceSpike: number): number {
  if (productionChange < 0 && invoiceSpike > 0) {
    return Math.min((Math.abs(productionChange) * invoiceSpike) / 100, 1)
  }
  return 0
}

export function aggregateSources(
  financial: FinancialData,
  kg: KnowledgeGraphContext,
  scenarios: ScenarioSimulation[]
): SourceAggregation {
  const cashFlows = scenarios.map((s) => s.cashFlowImpact)
  const min = Math.min(...cashFlows)
  const max = Math.max(...cashFlows)
  return {
    financialStressScore: financialStressScore(financial),
    historicalPatternMatch: Boolean(kg.similarHistoricalPattern),
    externalRiskFactors: kg.externalDataSignals.length + kg.riskIndicators.length,
    scenarioRiskRange: { minCashFlowImpact: min, maxCashFlowImpact: max, range: max - min },
    productionFinanceCorrelation: productionFinanceCorrelation(
      financial.productionOutputChange,
      financial.unpaidInvoicesSpike
    )
  }
}
