export { abortableSleep, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export {
  KernelError,
  TransientProviderError,
  UnavailableError,
  PersistenceError,
  StateCorruptionError,
  DeliveryError,
  NoContextError,
  InvalidSubscriptionError,
  InvalidCommandError,
  isCommandError,
} from './errors.js';
export type { KernelErrorCode } from './errors.js';
export { EventBus } from './event-bus.js';
export type { EventMap } from './event-bus.js';
export { createLogger, formatError, redact, setLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export { FileStateBacking, SqliteStateBacking } from './state-backing.js';
export type { StateBacking } from './state-backing.js';
export { DomainStateHandle, StateStore } from './state-store.js';
export type { DomainStateSpec, StateStoreOptions, UpdateOutcome } from './state-store.js';
