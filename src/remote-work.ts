/**
 * Remote work bridge
 *
 * Moves CPU-bound work off the loop's thread. The worker side exposes a
 * handler object over a `worker_threads` port; the loop side wraps the other
 * end of the port with comlink and turns calls into `Work` for the pool:
 *
 * ```typescript
 * // hash.worker.ts
 * exposeWorkHandlers({ digest: (text: string) => sha256(text) }, parentPort)
 *
 * // main.ts
 * const hasher = connectRemoteWork<HashHandlers>(new Worker(workerUrl))
 * loop.async(hasher.work(remote => remote.digest(input)), digest => save(digest))
 * ```
 */

import { expose, releaseProxy, wrap, type Endpoint, type Remote } from 'comlink'
import comlinkNodeEndpoint from 'comlink/dist/esm/node-adapter.mjs'
import { InvalidArgumentError } from './errors'
import type { Work } from './types'

/** The part of a `MessagePort`, `Worker` or `parentPort` the bridge uses. */
export type NodePort = {
  postMessage(value: unknown): void
  on(event: 'message', listener: (value: unknown) => void): unknown
  off(event: 'message', listener: (value: unknown) => void): unknown
  start?: () => void
}

export type RemoteWorkClient<T> = {
  /** comlink proxy: every method returns a promise. */
  readonly remote: Remote<T>
  /** Wrap a remote call as pool work. Each run of the work makes a new call. */
  work<R>(call: (remote: Remote<T>) => PromiseLike<R>): Work<R>
  /** Detach the exposed handlers on the other side. The port stays open. */
  release(): void
}

/** Adapt a Node port to comlink's DOM-style endpoint with comlink's own adapter. */
export const nodeEndpoint = (port: NodePort): Endpoint => comlinkNodeEndpoint(port)

/** Worker side: serve `handlers` on `port` (usually `parentPort`). */
export const exposeWorkHandlers = <T extends object>(handlers: T, port: NodePort | null): void => {
  if (!port) {
    throw new InvalidArgumentError('exposeWorkHandlers needs a port; parentPort is null on the main thread')
  }
  expose(handlers, nodeEndpoint(port))
}

/** Loop side: connect to handlers exposed on the other end of `port`. */
export const connectRemoteWork = <T>(port: NodePort): RemoteWorkClient<T> => {
  const remote = wrap<T>(nodeEndpoint(port))
  return {
    remote,
    work: call => () => call(remote),
    release: () => {
      remote[releaseProxy]()
    },
  }
}
