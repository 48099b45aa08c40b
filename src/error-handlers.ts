/** An error class; matching is by `instanceof`, so subclasses match too. */
export type ErrorKind<E = unknown> = abstract new (...args: never[]) => E

export type ErrorHandler<E> = (error: E) => void

type StoredHandler = (error: unknown) => void

/**
 * Error-kind -> handler registry.
 *
 * Handlers are notifications: running them never clears an error.
 */
export class ErrorHandlerRegistry {
  private readonly handlers = new Map<ErrorKind, StoredHandler[]>()

  register<E>(kind: ErrorKind<E>, handler: ErrorHandler<E>): void {
    const stored: StoredHandler = error => {
      if (error instanceof kind) {
        handler(error)
      }
    }
    const existing = this.handlers.get(kind)
    if (existing) {
      existing.push(stored)
      return
    }
    this.handlers.set(kind, [stored])
  }

  /** Handlers matching `error`, grouped by kind in first-registration order. */
  matching(error: unknown): StoredHandler[] {
    const matched: StoredHandler[] = []
    for (const [kind, handlers] of this.handlers) {
      if (error instanceof kind) {
        matched.push(...handlers)
      }
    }
    return matched
  }

  get size(): number {
    let count = 0
    for (const handlers of this.handlers.values()) {
      count += handlers.length
    }
    return count
  }

  clear(): void {
    this.handlers.clear()
  }
}
