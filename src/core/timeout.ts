import {QueryCancelledError} from './errors.js'

type TimeoutOptions = {
  timeoutMs: number
  onTimeout: () => Error
  signal?: AbortSignal
}

/**
 * Runs `task` with its own abort signal, rejecting when `timeoutMs` elapses or
 * the parent signal aborts. The task's signal is aborted in both cases; a task
 * that ignores it is abandoned and its late result discarded.
 */
export async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, options: TimeoutOptions): Promise<T> {
  const parent = options.signal
  if (parent?.aborted) throw new QueryCancelledError()

  const controller = new AbortController()
  let interrupt: (error: Error) => void = () => undefined
  const interrupted = new Promise<never>((_, reject) => {
    interrupt = reject
  })

  const onParentAbort = (): void => {
    const error = new QueryCancelledError()
    controller.abort(error)
    interrupt(error)
  }
  parent?.addEventListener('abort', onParentAbort, {once: true})

  const timer = setTimeout(() => {
    const error = options.onTimeout()
    controller.abort(error)
    interrupt(error)
  }, options.timeoutMs)
  // Prevent timers from keeping process alive on some runtimes.
  timer.unref?.()

  try {
    return await Promise.race([task(controller.signal), interrupted])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener('abort', onParentAbort)
  }
}
