export type EventHandler<TEvent> = (event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

type InMemoryEventBusOptions = {
  /** Receives errors thrown by subscribers; they never reach the publisher. */
  onHandlerError?: (error: unknown) => void
}

export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()

  constructor(private readonly options: InMemoryEventBusOptions = {}) {}

  publish(event: TEvent): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(event)
      } catch (error) {
        this.options.onHandlerError?.(error)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }
}
