import {describe, expect, it, vi} from 'vitest'
import {QueryCancelledError, TimeoutError} from '../src/core/errors.js'
import {withTimeout} from '../src/core/timeout.js'

const onTimeout = () => new TimeoutError('too slow')

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(async () => 'done', {timeoutMs: 100, onTimeout})).resolves.toBe('done')
  })

  it('passes task errors through', async () => {
    const task = async () => {
      throw new Error('boom')
    }
    await expect(withTimeout(task, {timeoutMs: 100, onTimeout})).rejects.toThrow('boom')
  })

  it('rejects with the timeout error and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined
    const pending = withTimeout(
      (signal) => {
        taskSignal = signal
        return new Promise<never>(() => {})
      },
      {timeoutMs: 10, onTimeout}
    )

    await expect(pending).rejects.toThrow(TimeoutError)
    expect(taskSignal?.aborted).toBe(true)
  })

  it('rejects with QueryCancelledError when the parent aborts', async () => {
    const controller = new AbortController()
    const pending = withTimeout(() => new Promise<never>(() => {}), {
      timeoutMs: 1000,
      onTimeout,
      signal: controller.signal
    })
    controller.abort()

    await expect(pending).rejects.toThrow(QueryCancelledError)
  })

  it('does not start the task when the parent is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const task = vi.fn(async () => 'never')

    await expect(withTimeout(task, {timeoutMs: 100, onTimeout, signal: controller.signal})).rejects.toThrow(
      'Query cancelled.'
    )
    expect(task).not.toHaveBeenCalled()
  })
})
