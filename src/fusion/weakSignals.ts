import { thresholds } from './config'
import { FinancialData, KnowledgeGraphContext, RiskLevel, WeakSignal } from './types'

const DISTRESS_MARKERS = ['restructuring', 'distress', 'bankruptcy', 'chapter 11', 'insolvency']

export const RISK_RANK: Record<RiskLevel, number> = { Low: 0, Medium: 1, High: 2, Critical: 3 }

export function indicatesDistress(status: string): boolean {
  const lower = status.toLowerCase()
  return DISTRESS_MARKERS.some((m) => lower.includes(m))
}

function productionClientRisk(financial: FinancialData, kg: KnowledgeGraphContext): WeakSignal | undefined {
  const change = financial.productionOutputChange
  if (!(change < thresholds.productionSlowdown) || !indicatesDistress(kg.clientParentStatus)) return undefined
  const strength = Math.min(Math.abs(change) / thresholds.productionStrengthScale, 1)
  return {
    signalType: 'ProductionClientSystemicRisk',
    correlationStrength: strength,
    sourceIndices: ['IoT_Production', 'KG_Client_Parent', 'ERP_Invoices'],
    riskLevel: strength > thresholds.highStrengthCutoff ? 'High' : 'Medium',
    description:
      `Production slowdown of ${change}% combined with client parent status '${kg.clientParentStatus}' ` +
      'indicates converging supply chain and payment risk'
  }
}

function budgetLiquiditySqueeze(financial: FinancialData): WeakSignal | undefined {
  if (!(financial.budgetRemainingQ3 < thresholds.budgetCritical)) return undefined
  return {
    signalType: 'BudgetLiquiditySqueeze',
    correlationStrength: thresholds.budgetSqueezeStrength,
    sourceIndices: ['ERP_Budget', 'ERP_Invoices'],
    riskLevel: 'Critical',
    description:
      `Only ${financial.budgetRemainingQ3}% of the Q3 budget remains ` +
      `with a ${financial.unpaidInvoicesSpike}% spike in unpaid invoices`
  }
}

function historicalPatternRecurrence(kg: KnowledgeGraphContext): WeakSignal | undefined {
  const pattern = kg.similarHistoricalPattern
  if (!pattern) return undefined
  return {
    signalType: 'HistoricalPatternRecurrence',
    correlationStrength: thresholds.historicalPatternStrength,
    sourceIndices: ['RAGraph_Episodic_Memory', 'ERP_Invoices'],
    riskLevel: 'High',
    description:
      `Current pattern matches an incident from ${pattern.yearsAgo} years ago ` +
      `which resulted in a ${pattern.delayDays}-day cash flow delay`
  }
}

/**
 * Cross-source correlation rules. Every rule is evaluated; each contributes at
 * most one signal, so the result holds 0 to 3 entries.
 */
export function detectWeakSignals(financial: FinancialData, kg: KnowledgeGraphContext): WeakSignal[] {
  const candidates = [
    productionClientRisk(financial, kg),
    budgetLiquiditySqueeze(financial),
    historicalPatternRecurrence(kg)
  ]
  return candidates.filter((s): s is WeakSignal => s !== undefined)
}

export function hasCriticalSignal(signals: WeakSignal[]): boolean {
  return signals.some((s) => s.riskLevel === 'Critical')
}

/** Highest risk level wins, then correlation strength, then detection order. */
export function dominantSignal(signals: WeakSignal[]): WeakSignal | undefined {
  let best: WeakSignal | undefined
  for (const s of signals) {
    if (
      !best ||
      RISK_RANK[s.riskLevel] > RISK_RANK[best.riskLevel] ||
      (RISK_RANK[s.riskLevel] === RISK_RANK[best.riskLevel] && s.correlationStrength > best.correlationStrength)
    ) {
      best = s
    }
  }
  return best
}
