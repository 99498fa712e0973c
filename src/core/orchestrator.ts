import {randomUUID} from 'node:crypto'
import type {ReasoningBackend, ReasoningReply, ReasoningRequest, ToolInvocationRequest} from '../providers/types.js'
import {reasoningReplySchema, tokenUsageSchema, type GenerationConfig} from '../providers/types.js'
import {
  ArgumentValidationError,
  BudgetExceededError,
  CoursemateError,
  QueryCancelledError,
  ReasoningBackendError,
  TimeoutError,
  UnknownToolError,
  errorMessage
} from './errors.js'
import type {EventBus} from './event-bus.js'
import type {AssistantEvent, LoopStateName} from './events.js'
import {mergePricing, priceUsage, type PricingTable, type TokenUsage} from './pricing.js'
import type {CapabilityRegistry} from './registry.js'
import type {Session} from './session-store.js'
import {withTimeout} from './timeout.js'
import {renderToolResult, type ConversationTurn, type ToolCallTurn, type ToolFailure, type ToolResultTurn} from './turns.js'
import type {UsageLedger, UsageRecord} from './usage-ledger.js'

// A malformed reply gets one more chance before the query fails.
const MALFORMED_REPLY_RETRIES = 1
const QUERY_LABEL_LENGTH = 100

export type OrchestratorOptions = {
  instructions: string
  maxIterations: number
  modelTimeoutMs: number
  modelRetryCount: number
  toolTimeoutMs: number
  generation: GenerationConfig
  pricing?: PricingTable
  now?: () => Date
}

export type OrchestratorDeps = {
  backend: ReasoningBackend
  registry: CapabilityRegistry
  ledger: UsageLedger
  bus?: EventBus<AssistantEvent>
}

export type QueryOutcome =
  | {state: 'terminated'; answer: string; iterations: number}
  | {state: 'failed'; error: CoursemateError; message: string; iterations: number}

export type RunOptions = {
  signal?: AbortSignal
}

type LoopState =
  | {name: 'awaiting_reasoning'}
  | {name: 'executing_tools'; requests: ToolInvocationRequest[]}
  | {name: 'terminated'; answer: string}
  | {name: 'failed'; error: CoursemateError}

type QueryContext = {
  session: Session
  query: string
  signal?: AbortSignal
  iterations: number
}

function failed(error: CoursemateError): LoopState {
  return {name: 'failed', error}
}

function toToolFailure(error: unknown): ToolFailure {
  const message = errorMessage(error)
  if (error instanceof QueryCancelledError) return {code: 'cancelled', message}
  if (error instanceof TimeoutError) return {code: 'timeout', message}
  if (error instanceof UnknownToolError) return {code: 'unknown_tool', message}
  if (error instanceof ArgumentValidationError) return {code: 'invalid_arguments', message}
  return {code: 'execution_failed', message}
}

/** Token usage of a reply that failed validation, when it reported any. */
function reportedUsage(raw: unknown): TokenUsage | undefined {
  if (typeof raw !== 'object' || raw === null || !('usage' in raw)) return undefined
  const parsed = tokenUsageSchema.safeParse(raw.usage)
  return parsed.success ? parsed.data : undefined
}

function cancelledResult(call: ToolCallTurn): ToolResultTurn {
  return {
    kind: 'tool_result',
    callId: call.callId,
    name: call.name,
    ok: false,
    error: {code: 'cancelled', message: 'Tool call cancelled before its result was used.'}
  }
}

/**
 * The ask → act → ask again loop for one user query.
 *
 * awaiting_reasoning: send the session history and tool catalog to the backend.
 * A final answer terminates; tool requests move to executing_tools, which runs
 * every request concurrently, appends each call/result pair, and returns to
 * awaiting_reasoning. Reasoning calls are bounded by `maxIterations`.
 */
export class ToolOrchestrator {
  private readonly pricing: PricingTable
  private readonly now: () => Date

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    this.pricing = mergePricing(options.pricing)
    this.now = options.now ?? (() => new Date())
  }

  async run(session: Session, query: string, runOptions: RunOptions = {}): Promise<QueryOutcome> {
    const context: QueryContext = {session, query, signal: runOptions.signal, iterations: 0}
    this.publish({type: 'query_start', sessionId: session.id, query})
    this.append(context, {kind: 'user', text: query})

    let state: LoopState = {name: 'awaiting_reasoning'}
    while (state.name === 'awaiting_reasoning' || state.name === 'executing_tools') {
      const from: LoopStateName = state.name
      const next: LoopState =
        state.name === 'awaiting_reasoning'
          ? await this.awaitReasoning(context)
          : await this.executeTools(context, state.requests)
      this.publish({type: 'transition', sessionId: session.id, step: context.iterations, from, to: next.name})
      state = next
    }

    if (state.name === 'terminated') {
      this.publish({type: 'final', sessionId: session.id, step: context.iterations, content: state.answer})
      return {state: 'terminated', answer: state.answer, iterations: context.iterations}
    }

    this.publish({
      type: 'failed',
      sessionId: session.id,
      step: context.iterations,
      code: state.error.code,
      message: state.error.message
    })
    return {state: 'failed', error: state.error, message: state.error.message, iterations: context.iterations}
  }

  private async awaitReasoning(context: QueryContext): Promise<LoopState> {
    if (context.signal?.aborted) return failed(new QueryCancelledError())
    if (context.iterations >= this.options.maxIterations) {
      return failed(new BudgetExceededError(this.options.maxIterations))
    }

    const step = context.iterations + 1
    let reply: ReasoningReply
    try {
      reply = await this.requestReply(context, step)
    } catch (error) {
      return failed(
        error instanceof CoursemateError
          ? error
          : new ReasoningBackendError(`Model request failed: ${errorMessage(error)}`, {cause: error})
      )
    }

    context.iterations = step
    this.publish({type: 'model_response', sessionId: context.session.id, step, kind: reply.type})
    await this.recordUsage(context, step, reply.usage)

    if (reply.type === 'final_answer') {
      this.append(context, {kind: 'assistant', text: reply.text})
      return {name: 'terminated', answer: reply.text}
    }

    return {name: 'executing_tools', requests: reply.requests}
  }

  private async requestReply(context: QueryContext, step: number): Promise<ReasoningReply> {
    const {backend, registry} = this.deps
    const {modelTimeoutMs, modelRetryCount} = this.options
    const request: ReasoningRequest = {
      instructions: this.options.instructions,
      history: context.session.memory.snapshot(),
      tools: registry.describeAll(),
      generation: this.options.generation
    }

    let timeouts = 0
    let malformed = 0
    for (let attempt = 1; ; attempt += 1) {
      this.publish({type: 'model_request', sessionId: context.session.id, step, attempt})
      try {
        const raw = await withTimeout((modelSignal) => backend.complete(request, modelSignal), {
          timeoutMs: modelTimeoutMs,
          signal: context.signal,
          onTimeout: () => new TimeoutError(`Model request timed out after ${modelTimeoutMs}ms`)
        })
        const parsed = reasoningReplySchema.safeParse(raw)
        if (!parsed.success) {
          const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          throw new ReasoningBackendError(`Model returned a malformed reply: ${issues.join('; ')}`, {
            usage: reportedUsage(raw)
          })
        }
        return parsed.data
      } catch (error) {
        if (error instanceof QueryCancelledError) throw error
        if (error instanceof TimeoutError) {
          if (timeouts >= modelRetryCount) {
            throw new TimeoutError(`The model did not respond within ${modelTimeoutMs}ms after ${timeouts + 1} attempts.`)
          }
          timeouts += 1
        } else {
          const backendError =
            error instanceof ReasoningBackendError
              ? error
              : new ReasoningBackendError(`Model request failed: ${errorMessage(error)}`, {cause: error})
          // Unusable replies are still metered when they report usage.
          if (backendError.usage) await this.recordUsage(context, step, backendError.usage)
          if (malformed >= MALFORMED_REPLY_RETRIES) throw backendError
          malformed += 1
        }

        this.publish({
          type: 'model_retry',
          sessionId: context.session.id,
          step,
          attempt,
          reason: errorMessage(error)
        })
      }
    }
  }

  private async executeTools(context: QueryContext, requests: ToolInvocationRequest[]): Promise<LoopState> {
    const step = context.iterations
    const seen = new Set<string>()
    const calls = requests.map((request): ToolCallTurn => {
      const callId = request.id && !seen.has(request.id) ? request.id : randomUUID()
      seen.add(callId)
      return {kind: 'tool_call', callId, name: request.name, arguments: request.arguments}
    })

    await Promise.all(
      calls.map(async (call) => {
        this.publish({
          type: 'tool_call',
          sessionId: context.session.id,
          step,
          callId: call.callId,
          tool: call.name,
          input: {...call.arguments}
        })
        const result = await this.invokeTool(call, context.signal)
        const recorded = context.signal?.aborted ? cancelledResult(call) : result
        // Call and result go in together so no call is left without its result.
        this.append(context, call)
        this.append(context, recorded)
        this.publish({
          type: 'tool_result',
          sessionId: context.session.id,
          step,
          callId: call.callId,
          tool: call.name,
          ok: recorded.ok,
          output: renderToolResult(recorded)
        })
      })
    )

    if (context.signal?.aborted) return failed(new QueryCancelledError())
    return {name: 'awaiting_reasoning'}
  }

  private async invokeTool(call: ToolCallTurn, signal?: AbortSignal): Promise<ToolResultTurn> {
    const {toolTimeoutMs} = this.options
    try {
      const invoke = (toolSignal: AbortSignal) => this.deps.registry.invoke(call.name, call.arguments, {signal: toolSignal})
      const payload = await withTimeout(invoke, {
        timeoutMs: toolTimeoutMs,
        signal,
        onTimeout: () => new TimeoutError(`Tool '${call.name}' timed out after ${toolTimeoutMs}ms`)
      })
      return {kind: 'tool_result', callId: call.callId, name: call.name, ok: true, payload}
    } catch (error) {
      return {kind: 'tool_result', callId: call.callId, name: call.name, ok: false, error: toToolFailure(error)}
    }
  }

  private async recordUsage(context: QueryContext, step: number, usage: TokenUsage): Promise<void> {
    const model = this.deps.backend.model
    const record: UsageRecord = {
      timestamp: this.now().toISOString(),
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      cost: priceUsage(this.pricing, model, usage),
      query: context.query.slice(0, QUERY_LABEL_LENGTH),
      sessionId: context.session.id
    }

    try {
      await this.deps.ledger.record(record)
      this.publish({type: 'usage', sessionId: context.session.id, step, record})
    } catch (error) {
      this.publish({type: 'ledger_error', sessionId: context.session.id, step, message: errorMessage(error)})
    }
  }

  private append(context: QueryContext, turn: ConversationTurn): void {
    context.session.memory.append(turn)
    this.publish({type: 'message', sessionId: context.session.id, step: context.iterations, turn})
  }

  private publish(event: AssistantEvent): void {
    this.deps.bus?.publish(event)
  }
}
