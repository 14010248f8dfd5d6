import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {ConfigError} from '../core/errors.js'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

export function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function booleanFromEnv(name: string): boolean | undefined {
  const raw = nonEmpty(process.env[name])?.toLowerCase()
  if (!raw) return undefined
  if (raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on') return true
  if (raw === '0' || raw === 'false' || raw === 'no' || raw === 'off') return false
  return undefined
}

function listFromEnv(name: string): string[] | undefined {
  const raw = nonEmpty(process.env[name])
  if (!raw) return undefined
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {}
}

export async function loadConfig(): Promise<AppConfig> {
  const explorer = cosmiconfig('chatweave')
  const result = await explorer.search()
  const base = asRecord(result?.config)
  const baseRuntime = asRecord(base.runtime)

  const requestTimeoutMs = positiveIntFromEnv('CHATWEAVE_REQUEST_TIMEOUT_MS')
  const maxToolRounds = positiveIntFromEnv('CHATWEAVE_MAX_TOOL_ROUNDS')
  const sessionLog = booleanFromEnv('CHATWEAVE_SESSION_LOG')

  const merged: Record<string, unknown> = {
    ...base,
    provider: nonEmpty(process.env.CHATWEAVE_PROVIDER) ?? base.provider,
    model: nonEmpty(process.env.OPENAI_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENAI_BASE_URL) ?? base.baseURL,
    knownFunctionNames: listFromEnv('CHATWEAVE_KNOWN_FUNCTIONS') ?? base.knownFunctionNames,
    runtime: {
      ...baseRuntime,
      ...(requestTimeoutMs ? {requestTimeoutMs} : {}),
      ...(maxToolRounds ? {maxToolRounds} : {}),
      ...(sessionLog !== undefined ? {sessionLog} : {})
    }
  }

  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const where = result?.filepath ?? 'environment'
    throw new ConfigError(`Invalid configuration (${where}): ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`, parsed.error)
  }
  return parsed.data
}
