import type {ErrorCode} from './errors.js'
import type {ConversationTurn} from './turns.js'
import type {UsageRecord} from './usage-ledger.js'

export type LoopStateName = 'awaiting_reasoning' | 'executing_tools' | 'terminated' | 'failed'

export type AssistantEvent =
  | {type: 'session_start'; sessionId: string; provider: string; model: string; tools: string[]}
  | {type: 'session_end'; sessionId: string}
  | {type: 'query_start'; sessionId: string; query: string}
  | {type: 'transition'; sessionId: string; step: number; from: LoopStateName; to: LoopStateName}
  | {type: 'message'; sessionId: string; step: number; turn: ConversationTurn}
  | {type: 'model_request'; sessionId: string; step: number; attempt: number}
  | {type: 'model_retry'; sessionId: string; step: number; attempt: number; reason: string}
  | {type: 'model_response'; sessionId: string; step: number; kind: 'final_answer' | 'tool_requests'}
  | {type: 'tool_call'; sessionId: string; step: number; callId: string; tool: string; input: Record<string, unknown>}
  | {type: 'tool_result'; sessionId: string; step: number; callId: string; tool: string; ok: boolean; output: string}
  | {type: 'usage'; sessionId: string; step: number; record: UsageRecord}
  | {type: 'ledger_error'; sessionId: string; step: number; message: string}
  | {type: 'final'; sessionId: string; step: number; content: string}
  | {type: 'failed'; sessionId: string; step: number; code: ErrorCode; message: string}
