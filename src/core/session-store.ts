import {randomUUID} from 'node:crypto'
import {SessionNotFoundError} from './errors.js'
import {SessionMemory} from './session-memory.js'

export class Session {
  readonly memory = new SessionMemory()
  readonly startedAt: string
  private tail: Promise<void> = Promise.resolve()

  constructor(
    readonly id: string,
    startedAt = new Date()
  ) {
    this.startedAt = startedAt.toISOString()
  }

  /** Queues `task` behind any query already running on this session. */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

export class InMemorySessionStore {
  private readonly sessions = new Map<string, Session>()

  create(id: string = randomUUID()): Session {
    const created = new Session(id)
    this.sessions.set(id, created)
    return created
  }

  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId)
    if (!session) throw new SessionNotFoundError(sessionId)
    return session
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  delete(sessionId: string): void {
    this.sessions.delete(sessionId)
  }

  ids(): string[] {
    return [...this.sessions.keys()]
  }
}
