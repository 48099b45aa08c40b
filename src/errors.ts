/**
 * Error classes raised synchronously by the loop and the pool.
 *
 * Errors thrown by user callbacks and work bodies are never wrapped: they
 * travel through the loop's error handlers and pending-error queue as-is.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class TaskCancelledError extends Error {
  readonly taskId: string

  constructor(taskId: string) {
    super(`Task '${taskId}' was cancelled before it ran`)
    this.name = 'TaskCancelledError'
    this.taskId = taskId
  }
}

export class PoolShutdownError extends Error {
  readonly poolName: string

  constructor(poolName: string) {
    super(`Worker pool '${poolName}' is shut down`)
    this.name = 'PoolShutdownError'
    this.poolName = poolName
  }
}

export class QueueFullError extends Error {
  readonly poolName: string
  readonly maxQueueDepth: number

  constructor(poolName: string, maxQueueDepth: number) {
    super(`Worker pool '${poolName}' queue is full (max ${maxQueueDepth})`)
    this.name = 'QueueFullError'
    this.poolName = poolName
    this.maxQueueDepth = maxQueueDepth
  }
}

export class DesignatedObjectNotFoundError extends Error {
  readonly method: string

  constructor(method: string) {
    super(`Designated object for '${method}' is not available`)
    this.name = 'DesignatedObjectNotFoundError'
    this.method = method
  }
}
