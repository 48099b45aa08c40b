/**
 * tickloop - Core exports
 */

export {
  DEFAULT_PERIOD_MS,
  resolveEventLoopConfig,
  type ConfigEnv,
  type EventLoopConfig,
  type EventLoopConfigInput,
} from './config'
export { ErrorHandlerRegistry, type ErrorHandler, type ErrorKind } from './error-handlers'
export {
  DesignatedObjectNotFoundError,
  InvalidArgumentError,
  PoolShutdownError,
  QueueFullError,
  TaskCancelledError,
} from './errors'
export { EventLoop, type DeferCallback, type EventLoopOptions } from './event-loop'
export { createKeyedMutex, type KeyedMutex, type SyncKey } from './keyed-mutex'
export { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './logger'
export {
  createLoopDelegate,
  type LoopDelegate,
  type LoopDelegateConfig,
} from './loop-delegate'
export {
  connectRemoteWork,
  exposeWorkHandlers,
  nodeEndpoint,
  type NodePort,
  type RemoteWorkClient,
} from './remote-work'
export { Task } from './task'
export {
  createTelemetryStore,
  type PoolTelemetrySnapshot,
  type TelemetrySnapshot,
  type TelemetryStore,
  type TelemetryStoreOptions,
} from './telemetry'
export { Timer, type TimerHost, type TimerOptions } from './timer'
export type {
  DeferCallbacks,
  DeferOptions,
  ErrorDirective,
  LoopCallback,
  PoolEvent,
  PoolEventType,
  QueuePolicy,
  ResultCallback,
  SettledCallback,
  TaskOptions,
  TaskOutcome,
  TaskState,
  TelemetrySink,
  Work,
  WorkerPoolState,
} from './types'
export { WorkerPool, type WorkerPoolOptions } from './worker-pool'
