import {mkdtemp, readFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {eventLine, isConsoleEvent} from '../src/cli/event-lines.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import type {AssistantEvent} from '../src/core/events.js'
import {SessionLogSubscriber} from '../src/core/subscribers/session-log-subscriber.js'

describe('InMemoryEventBus', () => {
  it('delivers events to subscribers until they unsubscribe', () => {
    const bus = new InMemoryEventBus<string>()
    const seen: string[] = []
    const unsubscribe = bus.subscribe((event) => seen.push(event))

    bus.publish('one')
    unsubscribe()
    bus.publish('two')

    expect(seen).toEqual(['one'])
  })

  it('reports handler errors without stopping delivery', () => {
    const onHandlerError = vi.fn()
    const bus = new InMemoryEventBus<string>({onHandlerError})
    const seen: string[] = []
    bus.subscribe(() => {
      throw new Error('handler broke')
    })
    bus.subscribe((event) => seen.push(event))

    bus.publish('event')

    expect(seen).toEqual(['event'])
    expect(onHandlerError).toHaveBeenCalledWith(new Error('handler broke'))
  })
})

describe('SessionLogSubscriber', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'coursemate-sessions-'))
  })

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true})
  })

  it('writes one JSON line per logged event of a session', async () => {
    const subscriber = new SessionLogSubscriber({homeDir: dir})
    const events: AssistantEvent[] = [
      {type: 'session_start', sessionId: 's1', provider: 'mock', model: 'mock', tools: ['list_courses']},
      {type: 'transition', sessionId: 's1', step: 0, from: 'awaiting_reasoning', to: 'terminated'},
      {type: 'message', sessionId: 's1', step: 0, turn: {kind: 'user', text: 'hello'}},
      {type: 'failed', sessionId: 's1', step: 1, code: 'timeout', message: 'too slow'}
    ]
    for (const event of events) void subscriber.handle(event)
    await subscriber.flush()

    const raw = await readFile(join(dir, 'sessions', 's1.jsonl'), 'utf8')
    const lines = raw
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line))
    expect(lines).toHaveLength(3)
    expect(lines[0]).toMatchObject({type: 'session_start', sessionId: 's1', provider: 'mock', tools: ['list_courses']})
    expect(lines[1]).toMatchObject({type: 'message', step: 0, kind: 'user', text: 'hello'})
    expect(lines[2]).toMatchObject({type: 'failed', step: 1, code: 'timeout', message: 'too slow'})
  })

  it('ignores sessions it never saw start', async () => {
    const onError = vi.fn()
    const subscriber = new SessionLogSubscriber({homeDir: dir, onError})
    await subscriber.handle({type: 'message', sessionId: 'unknown', step: 0, turn: {kind: 'user', text: 'hi'}})
    await subscriber.flush()

    await expect(readFile(join(dir, 'sessions', 'unknown.jsonl'), 'utf8')).rejects.toThrow()
    expect(onError).not.toHaveBeenCalled()
  })
})

describe('event lines', () => {
  const now = new Date('2025-10-09T12:00:00.000Z')

  it('formats tool calls and failures', () => {
    expect(
      eventLine({type: 'tool_call', sessionId: 's1', step: 1, callId: 'c1', tool: 'get_grades', input: {course_id: '101'}}, now)
    ).toBe('[2025-10-09T12:00:00.000Z] TOOL_CALL step=1 tool=get_grades input={"course_id":"101"}')
    expect(eventLine({type: 'failed', sessionId: 's1', step: 2, code: 'budget_exceeded', message: 'Stopped.'}, now)).toBe(
      '[2025-10-09T12:00:00.000Z] FAILED step=2 code=budget_exceeded Stopped.'
    )
  })

  it('hides transcript-only events from the console', () => {
    expect(isConsoleEvent({type: 'message', sessionId: 's1', step: 0, turn: {kind: 'user', text: 'hi'}})).toBe(false)
    expect(isConsoleEvent({type: 'ledger_error', sessionId: 's1', step: 1, message: 'disk full'})).toBe(true)
  })
})
