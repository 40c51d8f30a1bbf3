import fs from 'fs/promises'
import path from 'path'
import { parse } from 'csv-parse/sync'
import appRoot from 'app-root-path'
import { debug } from './logger'
import { InvalidInputError } from './fusion/errors'
import { ScenarioSimulation } from './fusion/types'

export const SCENARIO_COLUMNS = [
  'scenario_id',
  'description',
  'cash_flow_impact',
  'margin_impact',
  'probability',
  'time_horizon_days'
] as const

function numberCell(row: Record<string, string>, column: string, line: number): number {
  const raw = (row[column] ?? '').trim()
  const value = Number(raw)
  if (raw === '' || !Number.isFinite(value)) {
    throw new InvalidInputError(`Row ${line}: '${column}' is not a number: '${raw}'`, `scenarios[${line - 2}].${column}`, raw)
  }
  return value
}

/** Scenarios from CSV text with a header row naming the scenario columns. */
export function loadScenariosFromText(text: string): ScenarioSimulation[] {
  const records: Record<string, string>[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true
  })

  const columns = records.length > 0 ? Object.keys(records[0]) : []
  const missing = SCENARIO_COLUMNS.filter((c) => !columns.includes(c))
  if (records.length > 0 && missing.length > 0) {
    throw new InvalidInputError(`Scenario CSV is missing columns: ${missing.join(', ')}`, 'scenarios', columns)
  }
  debug('scenario CSV rows', records.length)

  // line numbers are 1-based and count the header
  return records.map((row, i) => ({
    scenarioId: row.scenario_id,
    description: row.description,
    cashFlowImpact: numberCell(row, 'cash_flow_impact', i + 2),
    marginImpact: numberCell(row, 'margin_impact', i + 2),
    probability: numberCell(row, 'probability', i + 2),
    timeHorizonDays: numberCell(row, 'time_horizon_days', i + 2)
  }))
}

const root = appRoot.path

/** Relative paths resolve against the project root. */
export async function loadScenariosFromFile(filePath: string): Promise<ScenarioSimulation[]> {
  const absPath = path.resolve(root, filePath)
  const text = await fs.readFile(absPath, 'utf-8')
  return loadScenariosFromText(text)
}
