import type {ModelPrice} from '../config/schema.js'

export type {ModelPrice}

export type PricingTable = Readonly<Record<string, ModelPrice>>

export type TokenUsage = {
  inputTokens: number
  outputTokens: number
}

// USD per 1K tokens.
export const DEFAULT_PRICING: PricingTable = {
  'meta.llama4-maverick-17b-instruct-v1:0': {input: 0.00024, output: 0.00097},
  'meta.llama4-scout-17b-instruct-v1:0': {input: 0.00017, output: 0.00066},
  'anthropic.claude-3-5-sonnet-20241022-v2:0': {input: 0.003, output: 0.015},
  'gpt-4o-mini': {input: 0.00015, output: 0.0006},
  'gpt-4o': {input: 0.0025, output: 0.01}
}

export function mergePricing(overrides: PricingTable = {}): PricingTable {
  return {...DEFAULT_PRICING, ...overrides}
}

/** Unknown models are priced at zero. */
export function priceUsage(pricing: PricingTable, model: string, usage: TokenUsage): number {
  const price = pricing[model]
  if (!price) return 0
  const cost = (usage.inputTokens / 1000) * price.input + (usage.outputTokens / 1000) * price.output
  return Math.round(cost * 1_000_000) / 1_000_000
}
