export { RailClient } from './api-client.js';
export type { DepartureProvider } from './api-client.js';
export { ShortcutBook, TRAIN_STATE_SPEC } from './shortcuts.js';
export { SessionRegistry } from './session.js';
export { TrainWatchService, evaluateTick, findTrain, isTerminalStatus, normaliseTrainIdentifier } from './watch.js';
export type { WatchRequest, WatchTickResult } from './watch.js';
export { formatBoard, formatWatchStarted } from './formatters.js';
export { TrainStateSchema } from './types.js';
export type { Board, Departure, SessionContext, TrainOptions, TrainState, WatchSubscription } from './types.js';
