import {z} from 'zod'
import type {ToolDescription} from '../core/registry.js'
import type {ConversationTurn} from '../core/turns.js'

export type GenerationConfig = {
  temperature: number
  maxOutputTokens: number
}

export type ReasoningRequest = {
  instructions: string
  history: readonly ConversationTurn[]
  tools: readonly ToolDescription[]
  generation: GenerationConfig
}

export const tokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative()
})

export const toolInvocationRequestSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown())
})

export const reasoningReplySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('final_answer'),
    text: z.string().trim().min(1),
    usage: tokenUsageSchema
  }),
  z.object({
    type: z.literal('tool_requests'),
    requests: z.array(toolInvocationRequestSchema).min(1),
    usage: tokenUsageSchema
  })
])

export type ToolInvocationRequest = z.infer<typeof toolInvocationRequestSchema>
export type ReasoningReply = z.infer<typeof reasoningReplySchema>

/**
 * A model that decides the next step of a conversation.
 *
 * Replies are untrusted: the orchestrator validates them against
 * `reasoningReplySchema`, so implementations return `unknown`.
 */
export interface ReasoningBackend {
  readonly name: string
  readonly model: string
  complete(request: ReasoningRequest, signal: AbortSignal): Promise<unknown>
}
