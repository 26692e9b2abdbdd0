export { BinDriver } from './driver.js';
export type { BinScheduleProvider } from './driver.js';
export { BinFeedClient, parseCollectionDate } from './feed-client.js';
export { BinScheduleService } from './schedule.js';
export { formatReminder, formatSchedule } from './formatters.js';
export { BinStateSchema } from './types.js';
export type { BinOptions, BinState, Collection } from './types.js';
