import OpenAI from 'openai'
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {ReasoningBackendError} from '../core/errors.js'
import {renderToolResult} from '../core/turns.js'
import type {TokenUsage} from '../core/pricing.js'
import type {ReasoningBackend, ReasoningReply, ReasoningRequest, ToolInvocationRequest} from './types.js'

type OpenAIProviderOptions = {
  apiKey: string
  model: string
  baseUrl?: string
}

function toMessages(request: ReasoningRequest): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{role: 'system', content: request.instructions}]
  for (const turn of request.history) {
    switch (turn.kind) {
      case 'user':
        messages.push({role: 'user', content: turn.text})
        break
      case 'assistant':
        messages.push({role: 'assistant', content: turn.text})
        break
      case 'tool_call':
        messages.push({
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: turn.callId,
              type: 'function',
              function: {name: turn.name, arguments: JSON.stringify(turn.arguments)}
            }
          ]
        })
        break
      case 'tool_result':
        messages.push({role: 'tool', tool_call_id: turn.callId, content: renderToolResult(turn)})
        break
    }
  }

  return messages
}

function parseArguments(toolName: string, raw: string, usage: TokenUsage): Record<string, unknown> {
  if (!raw.trim()) return {}
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ReasoningBackendError(`Tool call '${toolName}' has malformed JSON arguments`, {cause: error, usage})
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ReasoningBackendError(`Tool call '${toolName}' arguments must be a JSON object`, {usage})
  }

  return Object.fromEntries(Object.entries(parsed))
}

function toReply(completion: ChatCompletion): ReasoningReply {
  const message = completion.choices?.[0]?.message
  const usage = {
    inputTokens: completion.usage?.prompt_tokens ?? 0,
    outputTokens: completion.usage?.completion_tokens ?? 0
  }

  const requests: ToolInvocationRequest[] = []
  for (const call of message?.tool_calls ?? []) {
    if (call.type !== 'function') continue
    requests.push({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.name, call.function.arguments, usage)
    })
  }

  if (requests.length > 0) return {type: 'tool_requests', requests, usage}
  const content = message?.content
  return {type: 'final_answer', text: typeof content === 'string' ? content : '', usage}
}

export class OpenAIProvider implements ReasoningBackend {
  readonly name = 'openai'
  readonly model: string
  private readonly client: OpenAI

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    const baseURL = rawBaseUrl.replace(/\/+$/, '')
    // Retries and timeouts are owned by the orchestrator.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      maxRetries: 0
    })
  }

  async complete(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningReply> {
    const tools: ChatCompletionTool[] = request.tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters
      }
    }))

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toMessages(request),
      temperature: request.generation.temperature,
      max_tokens: request.generation.maxOutputTokens,
      ...(tools.length > 0 ? {tools, tool_choice: 'auto' as const} : {})
    }

    const completion = await this.client.chat.completions.create(params, {signal})
    return toReply(completion)
  }
}
