import type {AppConfig} from '../config/schema.js'
import {MockProvider} from '../providers/mock-provider.js'
import {OpenAIProvider} from '../providers/openai-provider.js'
import type {ReasoningBackend} from '../providers/types.js'
import {FileCourseDataSource, type CourseDataSource} from '../tools/course-data.js'
import {registerCourseTools} from '../tools/course-tools.js'
import {CourseAssistant} from './assistant.js'
import type {EventBus} from './event-bus.js'
import type {AssistantEvent} from './events.js'
import {buildInstructions} from './prompt.js'
import {CapabilityRegistry} from './registry.js'
import {JsonlLedgerSink, UsageLedger} from './usage-ledger.js'

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function resolveModel(configModel?: string): string {
  return nonEmpty(configModel) ?? nonEmpty(process.env.OPENAI_MODEL) ?? 'gpt-4o-mini'
}

export function providerFromConfig(config: AppConfig): ReasoningBackend {
  if (config.provider === 'mock') return new MockProvider()

  const apiKey = nonEmpty(process.env.OPENAI_API_KEY)
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is missing. Set it in your environment or .env file.')
  }

  return new OpenAIProvider({
    apiKey,
    model: resolveModel(config.model),
    baseUrl: nonEmpty(config.baseURL) ?? nonEmpty(process.env.OPENAI_BASE_URL)
  })
}

type RuntimeOptions = {
  bus?: EventBus<AssistantEvent>
  backend?: ReasoningBackend
  dataSource?: CourseDataSource
  now?: () => Date
}

export function createCourseAssistant(config: AppConfig, options: RuntimeOptions = {}): CourseAssistant {
  const backend = options.backend ?? providerFromConfig(config)
  const registry = new CapabilityRegistry()
  registerCourseTools(registry, options.dataSource ?? new FileCourseDataSource(config.dataFile), {now: options.now})
  const ledger = new UsageLedger(new JsonlLedgerSink(config.ledgerFile))
  const {runtime} = config

  return new CourseAssistant(
    {backend, registry, ledger, bus: options.bus},
    {
      instructions: buildInstructions(options.now?.()),
      maxIterations: runtime.maxIterations,
      modelTimeoutMs: runtime.modelTimeoutMs,
      modelRetryCount: runtime.modelRetryCount,
      toolTimeoutMs: runtime.toolTimeoutMs,
      generation: {temperature: runtime.temperature, maxOutputTokens: runtime.maxOutputTokens},
      pricing: config.pricing,
      now: options.now
    }
  )
}
