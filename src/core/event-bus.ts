import {errorMessage} from './errors.js'

type TypedEvent = {type: string}

/** Handlers may be async; a rejection is reported, never awaited by the publisher. */
export type EventHandler<TEvent> = (event: TEvent) => void | Promise<void>

export interface EventBus<TEvent extends TypedEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
  on<K extends TEvent['type']>(type: K, handler: EventHandler<Extract<TEvent, {type: K}>>): () => void
}

function isType<TEvent extends TypedEvent, K extends TEvent['type']>(
  event: TEvent,
  type: K
): event is Extract<TEvent, {type: K}> {
  return event.type === type
}

function reportFailure(event: TypedEvent, error: unknown): void {
  // Subscribers observe conversations; a failing one must not end the turn.
  process.emitWarning(`event subscriber failed on '${event.type}': ${errorMessage(error)}`)
}

export class InMemoryEventBus<TEvent extends TypedEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()

  get size(): number {
    return this.handlers.size
  }

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        const pending: unknown = handler(event)
        if (pending instanceof Promise) pending.catch((error: unknown) => reportFailure(event, error))
      } catch (error) {
        reportFailure(event, error)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    // wrap so the same function can be subscribed twice and removed independently
    const entry: EventHandler<TEvent> = (event) => handler(event)
    this.handlers.add(entry)
    return () => {
      this.handlers.delete(entry)
    }
  }

  on<K extends TEvent['type']>(type: K, handler: EventHandler<Extract<TEvent, {type: K}>>): () => void {
    return this.subscribe((event) => (isType(event, type) ? handler(event) : undefined))
  }
}
