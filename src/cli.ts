#!/usr/bin/env node
import fs from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import { loadScenariosFromFile } from './csv'
import { createLlmEnricher, enrichDecision } from './enrichment/enrich'
import { serializeDecision } from './fusion/assembler'
import { FusionConfig, PresetName, createFusionConfig, parsePresetName, presetConfig, presets } from './fusion/config'
import { runFusion, synthesizeWithFallback } from './fusion/engine'
import { ParsedFusionRequest, parseFusionInput } from './fusion/parse'
import { FusedDecisionJson } from './fusion/types'
import { writeJSON } from './interfaces/atomicWrite'
import { Provider, isProvider } from './llm'
import { info } from './logger'

export interface SynthesizeOptions {
  preset?: string
  scenarios?: string
  enrich?: boolean
  fallback?: boolean
  report?: boolean
}

export interface SynthesizeOutput {
  decision: FusedDecisionJson
  report?: Record<string, unknown>
}

/** Preset precedence: command line, then the request's config, then FUSION_PRESET. */
export function resolveConfig(request: ParsedFusionRequest, cliPreset?: string): FusionConfig {
  const fromEnv = process.env.FUSION_PRESET ? parsePresetName(process.env.FUSION_PRESET) : undefined
  const preset: PresetName | undefined = cliPreset ? parsePresetName(cliPreset) : (request.preset ?? fromEnv)
  return preset ? presetConfig(preset, request.config) : createFusionConfig(request.config)
}

function llmProvider(): Provider {
  const raw = process.env.LLM_PROVIDER ?? 'ollama'
  if (!isProvider(raw)) throw new Error(`Unsupported LLM provider: ${raw}`)
  return raw
}

function llmTimeoutMs(): number {
  const raw = Number(process.env.LLM_TIMEOUT_MS ?? 15000)
  return Number.isFinite(raw) && raw > 0 ? raw : 15000
}

async function cmdSynthesize(input: string, output: string | undefined, opts: SynthesizeOptions = {}): Promise<SynthesizeOutput> {
  if (!input) throw new Error('Usage: synthesize <input.json> [output.json] [--preset name] [--scenarios file.csv]')
  if (!fs.existsSync(input)) throw new Error(`Input not found: ${input}`)

  const raw: unknown = JSON.parse(await fsp.readFile(input, 'utf8'))
  const request = parseFusionInput(raw)
  if (opts.scenarios) request.scenarios = await loadScenariosFromFile(opts.scenarios)
  const config = resolveConfig(request, opts.preset)

  const run = opts.fallback
    ? synthesizeWithFallback(request.financial, request.kg, request.scenarios, config)
    : runFusion(request.financial, request.kg, request.scenarios, config)

  const decision = opts.enrich
    ? await enrichDecision(
        run.decision,
        createLlmEnricher({ provider: llmProvider(), model: process.env.LLM_MODEL || undefined }),
        llmTimeoutMs()
      )
    : run.decision

  const result: SynthesizeOutput = { decision: serializeDecision(decision) }
  if (opts.report) {
    result.report = {
      config,
      strategies: run.strategies.map((r) => ({
        strategy: r.strategy,
        recommended_scenario_id: r.recommendedScenarioId,
        score_per_scenario: r.scorePerScenario,
        diagnostics: r.diagnostics
      })),
      consensus_scores: run.meta.consensusScores,
      aggregation: run.aggregation
    }
  }

  if (output) {
    await writeJSON(output, result)
    info('Decision written to', output)
  } else {
    console.log(JSON.stringify(result, null, 2))
  }
  return result
}

function cmdPresets() {
  for (const [name, p] of Object.entries(presets)) {
    console.log(`${name.padEnd(13)} risk ${p.riskWeight.toFixed(1)}  profitability ${p.profitabilityWeight.toFixed(1)}  ${p.useWhen}`)
  }
}

function parseFlags(args: string[]): { positional: string[]; opts: SynthesizeOptions } {
  const positional: string[] = []
  const opts: SynthesizeOptions = {}
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--preset' || arg === '--scenarios') {
      const value = args[++i]
      if (!value) throw new Error(`${arg} needs a value`)
      if (arg === '--preset') opts.preset = value
      else opts.scenarios = value
    } else if (arg === '--enrich') opts.enrich = true
    else if (arg === '--fallback') opts.fallback = true
    else if (arg === '--report') opts.report = true
    else if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`)
    else positional.push(arg)
  }
  return { positional, opts }
}

function usage() {
  console.log('Usage: fusion-engine <command> [args]')
  console.log('Commands:')
  console.log('  synthesize <input.json> [output.json] [--preset name] [--scenarios file.csv] [--enrich] [--fallback] [--report]')
  console.log('  presets')
}

async function main(argv: string[]): Promise<number> {
  const cmd = argv[0]
  try {
    if (cmd === 'synthesize') {
      const { positional, opts } = parseFlags(argv.slice(1))
      await cmdSynthesize(positional[0], positional[1], opts)
    } else if (cmd === 'presets') cmdPresets()
    else {
      usage()
      return 1
    }
    return 0
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err)
    return 1
  }
}

if (require.main === module) {
  dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err) => {
      console.error('Error:', err)
      process.exitCode = 1
    }
  )
}

export { cmdPresets, cmdSynthesize, main, parseFlags }
