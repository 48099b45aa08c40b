export type SyncKey = string

/**
 * Per-key mutual exclusion shared by pool tasks and `sync` calls.
 *
 * A released key is handed directly to the oldest waiter, so it never looks
 * free while someone is queued for it.
 */
export type KeyedMutex = {
  tryAcquire(key: SyncKey): boolean
  acquire(key: SyncKey): Promise<void>
  release(key: SyncKey): void
  isHeld(key: SyncKey): boolean
  heldKeys(): SyncKey[]
  waitingFor(key: SyncKey): number
}

export const createKeyedMutex = (onRelease?: (key: SyncKey) => void): KeyedMutex => {
  // A key is held iff it has an entry; the entry lists waiters in arrival order.
  const held = new Map<SyncKey, Array<() => void>>()

  return {
    tryAcquire(key) {
      if (held.has(key)) return false
      held.set(key, [])
      return true
    },
    acquire(key) {
      const waiters = held.get(key)
      if (!waiters) {
        held.set(key, [])
        return Promise.resolve()
      }
      return new Promise(resolve => {
        waiters.push(resolve)
      })
    },
    release(key) {
      const waiters = held.get(key)
      if (!waiters) return
      const next = waiters.shift()
      if (next) {
        next()
        return
      }
      held.delete(key)
      onRelease?.(key)
    },
    isHeld(key) {
      return held.has(key)
    },
    heldKeys() {
      return Array.from(held.keys())
    },
    waitingFor(key) {
      return held.get(key)?.length ?? 0
    },
  }
}
