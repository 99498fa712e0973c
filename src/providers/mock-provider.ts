import type {ReasoningBackend, ReasoningReply, ReasoningRequest} from './types.js'

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

export class MockProvider implements ReasoningBackend {
  readonly name = 'mock'
  readonly model = 'mock'

  async complete(request: ReasoningRequest): Promise<ReasoningReply> {
    const last = request.history.findLast((turn) => turn.kind === 'user')
    const prompt = request.instructions + request.history.map((turn) => JSON.stringify(turn)).join('\n')
    const text = last?.kind === 'user' ? `Mock response: ${last.text}` : 'No input provided.'
    return {
      type: 'final_answer',
      text,
      usage: {inputTokens: estimateTokens(prompt), outputTokens: estimateTokens(text)}
    }
  }
}
