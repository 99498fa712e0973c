import type {ReasoningBackend} from '../providers/types.js'
import type {EventBus} from './event-bus.js'
import type {AssistantEvent} from './events.js'
import {ToolOrchestrator, type OrchestratorOptions, type QueryOutcome, type RunOptions} from './orchestrator.js'
import type {CapabilityRegistry} from './registry.js'
import {InMemorySessionStore} from './session-store.js'
import type {ConversationTurn} from './turns.js'
import type {UsageLedger} from './usage-ledger.js'

export type CourseAssistantDeps = {
  backend: ReasoningBackend
  registry: CapabilityRegistry
  ledger: UsageLedger
  bus?: EventBus<AssistantEvent>
}

/**
 * Owns the sessions of one process. Each session keeps its own history; the
 * registry and the ledger are shared by all of them.
 */
export class CourseAssistant {
  private readonly sessions = new InMemorySessionStore()
  private readonly orchestrator: ToolOrchestrator

  constructor(
    private readonly deps: CourseAssistantDeps,
    options: OrchestratorOptions
  ) {
    this.orchestrator = new ToolOrchestrator(deps, options)
  }

  get backend(): ReasoningBackend {
    return this.deps.backend
  }

  get registry(): CapabilityRegistry {
    return this.deps.registry
  }

  get ledger(): UsageLedger {
    return this.deps.ledger
  }

  openSession(): string {
    const session = this.sessions.create()
    this.deps.bus?.publish({
      type: 'session_start',
      sessionId: session.id,
      provider: this.deps.backend.name,
      model: this.deps.backend.model,
      tools: this.deps.registry.names()
    })
    return session.id
  }

  /** Queries on one session run one at a time, in call order. */
  ask(sessionId: string, query: string, options: RunOptions = {}): Promise<QueryOutcome> {
    const session = this.sessions.get(sessionId)
    return session.runExclusive(() => this.orchestrator.run(session, query, options))
  }

  transcript(sessionId: string): readonly ConversationTurn[] {
    return this.sessions.get(sessionId).memory.snapshot()
  }

  endSession(sessionId: string): void {
    if (!this.sessions.has(sessionId)) return
    this.sessions.get(sessionId).memory.clear()
    this.sessions.delete(sessionId)
    this.deps.bus?.publish({type: 'session_end', sessionId})
  }

  activeSessions(): string[] {
    return this.sessions.ids()
  }
}
