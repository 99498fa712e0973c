import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import {getSessionLogPath} from '../../config/paths.js'
import type {AssistantEvent} from '../events.js'

type SessionLogRecord = {
  ts: string
  type: string
  [key: string]: unknown
}

type SessionLogSubscriberOptions = {
  homeDir?: string
  onError?: (error: unknown) => void
}

/** Writes one JSONL transcript per session under `<home>/sessions`. */
export class SessionLogSubscriber {
  private readonly logPaths = new Map<string, string>()
  private readonly pendingBySession = new Map<string, Promise<void>>()

  constructor(private readonly options: SessionLogSubscriberOptions = {}) {}

  async handle(event: AssistantEvent): Promise<void> {
    const ts = new Date().toISOString()

    switch (event.type) {
      case 'session_start':
        this.logPaths.set(event.sessionId, getSessionLogPath(event.sessionId, this.options.homeDir))
        await this.append(event.sessionId, {
          ts,
          type: 'session_start',
          sessionId: event.sessionId,
          provider: event.provider,
          model: event.model,
          tools: event.tools
        })
        return
      case 'message':
        await this.append(event.sessionId, {ts, type: 'message', step: event.step, ...event.turn})
        return
      case 'usage':
        await this.append(event.sessionId, {ts, type: 'usage', step: event.step, ...event.record})
        return
      case 'failed':
        await this.append(event.sessionId, {ts, type: 'failed', step: event.step, code: event.code, message: event.message})
        return
      case 'ledger_error':
        await this.append(event.sessionId, {ts, type: 'ledger_error', message: event.message})
        return
      case 'session_end': {
        await this.append(event.sessionId, {ts, type: 'session_end', sessionId: event.sessionId})
        this.logPaths.delete(event.sessionId)
        this.pendingBySession.delete(event.sessionId)
        return
      }
      default:
        return
    }
  }

  private async append(sessionId: string, record: SessionLogRecord): Promise<void> {
    const logPath = this.logPaths.get(sessionId)
    if (!logPath) return
    const previous = this.pendingBySession.get(sessionId) ?? Promise.resolve()
    const next = previous.then(async () => {
      try {
        await mkdir(dirname(logPath), {recursive: true})
        await appendFile(logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        // Transcript logging must not break a conversation.
        this.options.onError?.(error)
      }
    })
    this.pendingBySession.set(sessionId, next)
    await next
  }

  async flush(): Promise<void> {
    await Promise.all(this.pendingBySession.values())
  }
}
