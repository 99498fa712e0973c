export type ToolFailureCode = 'unknown_tool' | 'invalid_arguments' | 'execution_failed' | 'timeout' | 'cancelled'

export type ToolFailure = {
  readonly code: ToolFailureCode
  readonly message: string
}

export type UserMessageTurn = {
  readonly kind: 'user'
  readonly text: string
}

export type AssistantMessageTurn = {
  readonly kind: 'assistant'
  readonly text: string
}

export type ToolCallTurn = {
  readonly kind: 'tool_call'
  readonly callId: string
  readonly name: string
  readonly arguments: Readonly<Record<string, unknown>>
}

export type ToolResultTurn =
  | {
      readonly kind: 'tool_result'
      readonly callId: string
      readonly name: string
      readonly ok: true
      readonly payload: unknown
    }
  | {
      readonly kind: 'tool_result'
      readonly callId: string
      readonly name: string
      readonly ok: false
      readonly error: ToolFailure
    }

export type ConversationTurn = UserMessageTurn | AssistantMessageTurn | ToolCallTurn | ToolResultTurn

/** Text form of a tool result as the model sees it. */
export function renderToolResult(turn: ToolResultTurn): string {
  if (!turn.ok) return JSON.stringify({error: turn.error.code, message: turn.error.message})
  if (typeof turn.payload === 'string') return turn.payload
  return JSON.stringify(turn.payload) ?? 'null'
}

export function describeTurn(turn: ConversationTurn): string {
  switch (turn.kind) {
    case 'user':
    case 'assistant':
      return turn.text
    case 'tool_call':
      return `${turn.name} ${JSON.stringify(turn.arguments)}`
    case 'tool_result':
      return `${turn.name} ok=${turn.ok} ${renderToolResult(turn)}`
  }
}
