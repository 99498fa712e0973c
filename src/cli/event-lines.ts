import type {AssistantEvent} from '../core/events.js'
import {describeTurn} from '../core/turns.js'

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  cyan: '\x1b[36m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

/** Events the console shows by default; the rest go to the session log only. */
export function isConsoleEvent(event: AssistantEvent): boolean {
  switch (event.type) {
    case 'message':
    case 'transition':
    case 'model_request':
    case 'final':
    case 'session_end':
      return false
    default:
      return true
  }
}

export function eventLine(event: AssistantEvent, now: Date = new Date()): string {
  const ts = `[${now.toISOString()}]`
  switch (event.type) {
    case 'session_start':
      return `${ts} START provider=${event.provider} model=${event.model} session=${event.sessionId} tools=${event.tools.join(',')}`
    case 'session_end':
      return `${ts} SESSION_END session=${event.sessionId}`
    case 'query_start':
      return `${ts} QUERY session=${event.sessionId}`
    case 'transition':
      return `${ts} TRANSITION step=${event.step} ${event.from} -> ${event.to}`
    case 'message':
      return `${ts} MESSAGE step=${event.step} kind=${event.turn.kind}\n${shorten(describeTurn(event.turn))}`
    case 'model_request':
      return `${ts} MODEL_REQUEST step=${event.step} attempt=${event.attempt}`
    case 'model_retry':
      return `${ts} MODEL_RETRY step=${event.step} attempt=${event.attempt} reason=${event.reason}`
    case 'model_response':
      return `${ts} MODEL_RESPONSE step=${event.step} kind=${event.kind}`
    case 'tool_call':
      return `${ts} TOOL_CALL step=${event.step} tool=${event.tool} input=${JSON.stringify(event.input)}`
    case 'tool_result':
      return `${ts} TOOL_RESULT step=${event.step} tool=${event.tool} ok=${event.ok}\n${shorten(event.output)}`
    case 'usage':
      return `${ts} USAGE step=${event.step} tokens=${event.record.inputTokens + event.record.outputTokens} cost=$${event.record.cost.toFixed(6)}`
    case 'ledger_error':
      return `${ts} LEDGER_ERROR ${event.message}`
    case 'final':
      return `${ts} FINAL step=${event.step}\n${shorten(event.content)}`
    case 'failed':
      return `${ts} FAILED step=${event.step} code=${event.code} ${event.message}`
  }
}
