import {afterEach, describe, expect, it, vi} from 'vitest'
import {ReasoningBackendError} from '../src/core/errors.js'
import {OpenAIProvider} from '../src/providers/openai-provider.js'
import type {ReasoningRequest} from '../src/providers/types.js'

const request: ReasoningRequest = {
  instructions: 'You answer coursework questions.',
  history: [
    {kind: 'user', text: 'What courses am I taking?'},
    {kind: 'tool_call', callId: 'call-1', name: 'list_courses', arguments: {}},
    {kind: 'tool_result', callId: 'call-1', name: 'list_courses', ok: true, payload: ['CS 555']},
    {kind: 'tool_result', callId: 'call-2', name: 'get_grades', ok: false, error: {code: 'timeout', message: 'slow'}}
  ],
  tools: [
    {
      name: 'list_courses',
      description: 'List courses',
      parameters: {type: 'object', properties: {}, additionalProperties: false}
    }
  ],
  generation: {temperature: 0.2, maxOutputTokens: 512}
}

function completionResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {status: 200, headers: {'Content-Type': 'application/json'}})
}

function stubFetch(body: unknown) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => completionResponse(body))
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

function provider(): OpenAIProvider {
  return new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', baseUrl: 'https://example-llm.com/v1/'})
}

describe('OpenAIProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('sends history, tools and generation settings to the chat completions endpoint', async () => {
    const fetchMock = stubFetch({choices: [{message: {role: 'assistant', content: 'Hello'}}]})

    await provider().complete(request, new AbortController().signal)

    expect(fetchMock).toHaveBeenCalledOnce()
    const [input, init] = fetchMock.mock.calls[0] ?? []
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input?.url
    expect(url).toBe('https://example-llm.com/v1/chat/completions')

    const body: unknown = JSON.parse(String(init?.body))
    expect(body).toMatchObject({
      model: 'gpt-test-model',
      temperature: 0.2,
      max_tokens: 512,
      tool_choice: 'auto',
      tools: [
        {
          type: 'function',
          function: {
            name: 'list_courses',
            description: 'List courses',
            parameters: {type: 'object', properties: {}, additionalProperties: false}
          }
        }
      ],
      messages: [
        {role: 'system', content: 'You answer coursework questions.'},
        {role: 'user', content: 'What courses am I taking?'},
        {
          role: 'assistant',
          content: null,
          tool_calls: [{id: 'call-1', type: 'function', function: {name: 'list_courses', arguments: '{}'}}]
        },
        {role: 'tool', tool_call_id: 'call-1', content: '["CS 555"]'},
        {role: 'tool', tool_call_id: 'call-2', content: '{"error":"timeout","message":"slow"}'}
      ]
    })
  })

  it('maps a text reply to a final answer with usage', async () => {
    stubFetch({
      choices: [{message: {role: 'assistant', content: 'You are taking CS 555.'}}],
      usage: {prompt_tokens: 80, completion_tokens: 9, total_tokens: 89}
    })

    const reply = await provider().complete(request, new AbortController().signal)

    expect(reply).toEqual({
      type: 'final_answer',
      text: 'You are taking CS 555.',
      usage: {inputTokens: 80, outputTokens: 9}
    })
  })

  it('maps tool calls to tool requests with parsed arguments', async () => {
    stubFetch({
      choices: [
        {
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [
              {id: 'call-9', type: 'function', function: {name: 'get_grades', arguments: '{"course_id":"101"}'}},
              {id: 'call-10', type: 'function', function: {name: 'list_courses', arguments: ''}}
            ]
          }
        }
      ],
      usage: {prompt_tokens: 50, completion_tokens: 7, total_tokens: 57}
    })

    const reply = await provider().complete(request, new AbortController().signal)

    expect(reply).toEqual({
      type: 'tool_requests',
      requests: [
        {id: 'call-9', name: 'get_grades', arguments: {course_id: '101'}},
        {id: 'call-10', name: 'list_courses', arguments: {}}
      ],
      usage: {inputTokens: 50, outputTokens: 7}
    })
  })

  it('rejects unparseable tool call arguments and keeps the reported usage', async () => {
    stubFetch({
      choices: [
        {
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [{id: 'call-1', type: 'function', function: {name: 'get_grades', arguments: '{bad'}}]
          }
        }
      ],
      usage: {prompt_tokens: 40, completion_tokens: 6, total_tokens: 46}
    })

    const error = await provider()
      .complete(request, new AbortController().signal)
      .catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(ReasoningBackendError)
    expect(error).toMatchObject({
      message: "Tool call 'get_grades' has malformed JSON arguments",
      usage: {inputTokens: 40, outputTokens: 6}
    })
  })
})
