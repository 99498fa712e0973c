import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {ConfigError} from '../core/errors.js'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function intFromEnv(name: string, min: number): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed >= min ? parsed : undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function runtimeOverrides(): Record<string, number> {
  const overrides: Record<string, number> = {}
  const entries: Array<[key: string, env: string, min: number]> = [
    ['modelTimeoutMs', 'COURSEMATE_MODEL_TIMEOUT_MS', 1],
    ['modelRetryCount', 'COURSEMATE_MODEL_RETRY_COUNT', 0],
    ['toolTimeoutMs', 'COURSEMATE_TOOL_TIMEOUT_MS', 1],
    ['maxIterations', 'COURSEMATE_MAX_ITERATIONS', 1]
  ]
  for (const [key, env, min] of entries) {
    const value = intFromEnv(env, min)
    if (value !== undefined) overrides[key] = value
  }

  return overrides
}

export async function loadConfig(searchFrom?: string): Promise<AppConfig> {
  const explorer = cosmiconfig('coursemate')
  const result = await explorer.search(searchFrom)
  const base = isRecord(result?.config) ? result.config : {}
  const baseRuntime = isRecord(base.runtime) ? base.runtime : {}

  const merged: Record<string, unknown> = {
    ...base,
    provider: nonEmpty(process.env.COURSEMATE_PROVIDER) ?? base.provider,
    model: nonEmpty(process.env.OPENAI_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENAI_BASE_URL) ?? base.baseURL,
    ledgerFile: nonEmpty(process.env.COURSEMATE_LEDGER_FILE) ?? base.ledgerFile,
    dataFile: nonEmpty(process.env.COURSEMATE_DATA_FILE) ?? base.dataFile,
    runtime: {
      ...baseRuntime,
      ...runtimeOverrides()
    }
  }

  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`Invalid coursemate config: ${issues.join('; ')}`)
  }

  return parsed.data
}
