import {mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join, resolve} from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {loadConfig} from '../src/config/load-config.js'
import {ConfigError} from '../src/core/errors.js'

const ENV_KEYS = [
  'COURSEMATE_HOME',
  'COURSEMATE_PROVIDER',
  'COURSEMATE_LEDGER_FILE',
  'COURSEMATE_DATA_FILE',
  'COURSEMATE_MODEL_TIMEOUT_MS',
  'COURSEMATE_MODEL_RETRY_COUNT',
  'COURSEMATE_TOOL_TIMEOUT_MS',
  'COURSEMATE_MAX_ITERATIONS',
  'OPENAI_MODEL',
  'OPENAI_BASE_URL'
]

describe('loadConfig', () => {
  let dir = ''
  const saved = new Map<string, string | undefined>()

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'coursemate-config-'))
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key])
      delete process.env[key]
    }
    process.env.COURSEMATE_HOME = join(dir, 'home')
  })

  afterEach(async () => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
    await rm(dir, {recursive: true, force: true})
  })

  it('uses defaults under the home directory', async () => {
    const config = await loadConfig(dir)
    const home = resolve(dir, 'home')

    expect(config.provider).toBe('openai')
    expect(config.homeDir).toBe(home)
    expect(config.ledgerFile).toBe(resolve(home, 'usage.jsonl'))
    expect(config.dataFile).toBe(resolve(home, 'courses.json'))
    expect(config.runtime).toEqual({
      modelTimeoutMs: 45_000,
      modelRetryCount: 2,
      toolTimeoutMs: 30_000,
      maxIterations: 8,
      temperature: 0.3,
      maxOutputTokens: 4096
    })
    expect(config.pricing).toEqual({})
  })

  it('reads the rc file and lets the environment override it', async () => {
    await writeFile(
      join(dir, '.coursematerc.json'),
      JSON.stringify({
        provider: 'openai',
        model: 'gpt-4o',
        runtime: {toolTimeoutMs: 5000, maxIterations: 5},
        pricing: {'local-model': {input: 1, output: 2}}
      }),
      'utf8'
    )
    process.env.COURSEMATE_PROVIDER = 'mock'
    process.env.COURSEMATE_MAX_ITERATIONS = '3'
    process.env.COURSEMATE_MODEL_RETRY_COUNT = '0'
    process.env.COURSEMATE_LEDGER_FILE = join(dir, 'ledger.jsonl')

    const config = await loadConfig(dir)

    expect(config.provider).toBe('mock')
    expect(config.model).toBe('gpt-4o')
    expect(config.runtime.toolTimeoutMs).toBe(5000)
    expect(config.runtime.maxIterations).toBe(3)
    expect(config.runtime.modelRetryCount).toBe(0)
    expect(config.ledgerFile).toBe(join(dir, 'ledger.jsonl'))
    expect(config.pricing).toEqual({'local-model': {input: 1, output: 2}})
  })

  it('ignores runtime overrides that are not valid numbers', async () => {
    process.env.COURSEMATE_MAX_ITERATIONS = 'many'
    process.env.COURSEMATE_TOOL_TIMEOUT_MS = '0'

    const config = await loadConfig(dir)

    expect(config.runtime.maxIterations).toBe(8)
    expect(config.runtime.toolTimeoutMs).toBe(30_000)
  })

  it('reports an unknown provider as a config error', async () => {
    process.env.COURSEMATE_PROVIDER = 'carrier-pigeon'
    const error = await loadConfig(dir).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({
      code: 'invalid_config',
      message:
        "Invalid coursemate config: provider: Invalid enum value. Expected 'mock' | 'openai', received 'carrier-pigeon'"
    })
  })

  it('rejects timeouts longer than a timer can wait', async () => {
    await writeFile(join(dir, '.coursematerc.json'), JSON.stringify({runtime: {toolTimeoutMs: 3_000_000_000}}), 'utf8')
    await expect(loadConfig(dir)).rejects.toThrow(/^Invalid coursemate config: runtime\.toolTimeoutMs: /)

    await rm(join(dir, '.coursematerc.json'))
    process.env.COURSEMATE_MODEL_TIMEOUT_MS = '2147483648'
    await expect(loadConfig(dir)).rejects.toThrow(/^Invalid coursemate config: runtime\.modelTimeoutMs: /)

    process.env.COURSEMATE_MODEL_TIMEOUT_MS = '2147483647'
    expect((await loadConfig(dir)).runtime.modelTimeoutMs).toBe(2_147_483_647)
  })
})
