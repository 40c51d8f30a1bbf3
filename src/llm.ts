import { spawn } from 'child_process'
import ollama from 'ollama'
import { debug, warn } from './logger'

const modelSettings: { [model: string]: { maxContext: number } } = {
  'llama3.2': {
    maxContext: 128000
  },
  'gpt-oss:20b': {
    maxContext: 32000
  },
  'llama3.1:8b': {
    maxContext: 64000
  }
}

const MODEL_MAX_CTX = 128000

export type LLMResponse = {
  success: boolean
  data?: string
  error?: string
}

export type Provider = 'ollama' | 'ollama-cli'

export function isProvider(value: string): value is Provider {
  return value === 'ollama' || value === 'ollama-cli'
}

export async function runCLI(command: string, args: string[], input: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], signal })
    let out = ''
    let err = ''

    child.stdout.on('data', (chunk) => (out += String(chunk)))
    child.stderr.on('data', (chunk) => (err += String(chunk)))

    child.on('error', (e) => reject(e))
    child.on('close', (code) => {
      if (code !== 0) {
        return reject(new Error(`CLI exited ${code}: ${err}`))
      }
      resolve(out)
    })

    if (input) {
      child.stdin.write(input)
    }
    child.stdin.end()
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Pull a JSON object out of a model answer: the whole text, a fenced block, or
 * the first non-empty object found in the prose. Falls back to `{ text }`.
 */
export function extractJSON(fullMessage: string): Record<string, unknown> {
  const direct = tryParse(fullMessage.trim())
  if (isRecord(direct)) return direct

  const fence = /```(?:json)?\s*([\s\S]*?)```/.exec(fullMessage)
  if (fence) {
    const fenced = tryParse(fence[1].trim())
    if (isRecord(fenced)) return fenced
  }

  const candidates = Array.from(fullMessage.matchAll(/(\{[\s\S]*\})/g)).map((r) => r[1])
  for (const jsonText of candidates) {
    const parsed = tryParse(jsonText)
    if (!isRecord(parsed)) continue
    // some CLIs wrap the JSON as a string under a text/message field
    for (const key of ['text', 'message', 'content']) {
      const inner = parsed[key]
      if (typeof inner === 'string') {
        const innerParsed = tryParse(inner)
        if (isRecord(innerParsed)) return innerParsed
      }
    }
    if (Object.keys(parsed).length > 0) return parsed
  }
  return { text: fullMessage }
}

function wrapAsJSONCodeFence(obj: unknown): string {
  const pretty = JSON.stringify(obj, null, 2)
  return '\n\n```json\n' + pretty + '\n```\n'
}

async function callOllama(systemPrompt: string, userQuery: string, model: string, signal?: AbortSignal): Promise<string> {
  const response = await ollama.chat({
    model,
    options: {
      num_ctx: modelSettings[model]?.maxContext || MODEL_MAX_CTX
    },
    stream: true,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  const onAbort = () => response.abort()
  // the signal may have fired while the request was connecting
  if (signal?.aborted) onAbort()
  else signal?.addEventListener('abort', onAbort, { once: true })
  try {
    let fullMessage = ''
    for await (const chunk of response) {
      if (chunk.message?.content) {
        fullMessage += chunk.message.content
      }
    }
    return fullMessage
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}

async function callOllamaCLI(systemPrompt: string, userQuery: string, model: string, signal?: AbortSignal): Promise<string> {
  const combined = `${systemPrompt}\n${userQuery}`
  // prompt goes as a positional argument, not through stdin
  return runCLI('ollama', ['run', model, combined, '--format', 'json'], '', signal)
}

/**
 * callLLM - unified LLM caller with provider adapters and retries.
 * The returned `data` always holds a JSON code-fence so callers can parse it.
 */
export async function callLLM(
  systemPrompt: string,
  userQuery: string,
  provider: Provider = 'ollama',
  model = 'llama3.2',
  retries = 2,
  signal?: AbortSignal
): Promise<LLMResponse> {
  const combinedText = `${systemPrompt}\n${userQuery}`
  const tokenCount = combinedText.length / 4 // rough estimate
  const maxContext = modelSettings[model]?.maxContext || MODEL_MAX_CTX

  debug('LLM token count', tokenCount)
  if (tokenCount > maxContext) {
    warn(`LLM prompt token count (${tokenCount}) exceeds model max context (${maxContext}). Prompt may be truncated or rejected.`)
  }

  let lastErr: unknown = null
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (signal?.aborted) break
    try {
      const raw =
        provider === 'ollama'
          ? await callOllama(systemPrompt, userQuery, model, signal)
          : await callOllamaCLI(systemPrompt, userQuery, model, signal)

      debug('LLM raw response', raw)
      return { success: true, data: wrapAsJSONCodeFence(extractJSON(raw)) }
    } catch (err) {
      lastErr = err
      debug(`LLM attempt ${attempt} failed`, err)
      if (attempt < retries) {
        // small backoff
        await new Promise((r) => setTimeout(r, 200 * (attempt + 1)))
      }
    }
  }

  return { success: false, error: signal?.aborted ? 'aborted' : String(lastErr) }
}
