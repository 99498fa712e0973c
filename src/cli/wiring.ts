import type {AppConfig} from '../config/schema.js'
import {errorMessage} from '../core/errors.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {AssistantEvent} from '../core/events.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {eventLine, isConsoleEvent, red} from './event-lines.js'

export type ConsoleFlags = {
  quiet: boolean
  debug: boolean
}

export type EventWiring = {
  bus: InMemoryEventBus<AssistantEvent>
  close(): Promise<void>
}

export function wireEvents(config: AppConfig, flags: ConsoleFlags, log: (line: string) => void): EventWiring {
  const bus = new InMemoryEventBus<AssistantEvent>({
    onHandlerError: (error) => log(red(`event handler failed: ${errorMessage(error)}`))
  })
  const sessionLog = new SessionLogSubscriber({
    homeDir: config.homeDir,
    onError: (error) => log(red(`session log write failed: ${errorMessage(error)}`))
  })
  const unsubscribeLog = bus.subscribe((event) => {
    void sessionLog.handle(event)
  })

  const startedAt = Date.now()
  let lastEventAt = startedAt
  const unsubscribeConsole = flags.quiet
    ? () => {}
    : bus.subscribe((event) => {
        if (!flags.debug && !isConsoleEvent(event)) return
        const base = eventLine(event)
        if (!flags.debug) {
          log(base)
          return
        }

        const nowAt = Date.now()
        const totalMs = nowAt - startedAt
        const deltaMs = nowAt - lastEventAt
        lastEventAt = nowAt
        log(`[debug +${deltaMs}ms total=${totalMs}ms] ${base}`)
      })

  return {
    bus,
    async close() {
      await sessionLog.flush()
      unsubscribeConsole()
      unsubscribeLog()
    }
  }
}
