import type {ConversationTurn} from './turns.js'

// Tool arguments and payloads are copied so later changes by their producer
// cannot reach stored history.
function detach(turn: ConversationTurn): ConversationTurn {
  switch (turn.kind) {
    case 'tool_call':
      return {...turn, arguments: structuredClone(turn.arguments)}
    case 'tool_result':
      return turn.ok ? {...turn, payload: structuredClone(turn.payload)} : {...turn}
    default:
      return {...turn}
  }
}

/**
 * Ordered, append-only turn history of one conversation.
 *
 * Turns are frozen on append; the only way to drop history is `clear()`, which
 * is reserved for ending a session.
 */
export class SessionMemory {
  private turns: ConversationTurn[] = []

  append(turn: ConversationTurn): void {
    this.turns.push(Object.freeze(detach(turn)))
  }

  snapshot(): readonly ConversationTurn[] {
    return Object.freeze([...this.turns])
  }

  clear(): void {
    this.turns = []
  }

  get size(): number {
    return this.turns.length
  }
}
