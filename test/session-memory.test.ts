import {describe, expect, it} from 'vitest'
import {SessionMemory} from '../src/core/session-memory.js'

describe('SessionMemory', () => {
  it('keeps turns in append order', () => {
    const memory = new SessionMemory()
    memory.append({kind: 'user', text: 'What courses am I taking?'})
    memory.append({kind: 'tool_call', callId: 'call-1', name: 'list_courses', arguments: {}})
    memory.append({kind: 'tool_result', callId: 'call-1', name: 'list_courses', ok: true, payload: ['CS 555']})
    memory.append({kind: 'assistant', text: 'CS 555.'})

    expect(memory.snapshot().map((turn) => turn.kind)).toEqual(['user', 'tool_call', 'tool_result', 'assistant'])
    expect(memory.size).toBe(4)
  })

  it('returns snapshots that later appends do not change', () => {
    const memory = new SessionMemory()
    memory.append({kind: 'user', text: 'first'})
    const before = memory.snapshot()
    memory.append({kind: 'assistant', text: 'second'})

    expect(before).toHaveLength(1)
    expect(memory.snapshot()).toHaveLength(2)
  })

  it('freezes stored turns and snapshots', () => {
    const memory = new SessionMemory()
    const turn = {kind: 'user' as const, text: 'hello'}
    memory.append(turn)
    turn.text = 'changed'

    const snapshot = memory.snapshot()
    expect(snapshot[0]).toEqual({kind: 'user', text: 'hello'})
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot[0])).toBe(true)
  })

  it('copies tool arguments and payloads so their producers cannot rewrite history', () => {
    const memory = new SessionMemory()
    const args: Record<string, unknown> = {course_id: '101'}
    const payload = {grades: [{course: 'CS 555', score: 91}]}
    memory.append({kind: 'tool_call', callId: 'call-1', name: 'get_grades', arguments: args})
    memory.append({kind: 'tool_result', callId: 'call-1', name: 'get_grades', ok: true, payload})

    args.course_id = '999'
    payload.grades.push({course: 'CS 559', score: 40})

    expect(memory.snapshot()).toEqual([
      {kind: 'tool_call', callId: 'call-1', name: 'get_grades', arguments: {course_id: '101'}},
      {
        kind: 'tool_result',
        callId: 'call-1',
        name: 'get_grades',
        ok: true,
        payload: {grades: [{course: 'CS 555', score: 91}]}
      }
    ])
  })

  it('clears all turns', () => {
    const memory = new SessionMemory()
    memory.append({kind: 'user', text: 'hello'})
    memory.clear()
    expect(memory.snapshot()).toEqual([])
    expect(memory.size).toBe(0)
  })
})
