/**
 * Scheduling kernel: dispatcher, per-domain scheduler, catch-up and the
 * runtime that wires them to the configured domains.
 */

export { AlertDispatcher } from './alert-dispatcher.js';
export type { AlertChannel, AlertDispatcherOptions, DeliveryResult, DeliverySink, DispatcherStats } from './alert-dispatcher.js';
export { CatchUpReconciler } from './catch-up.js';
export type { ReconcileResult } from './catch-up.js';
export { createAlert, unchanged } from './domain-driver.js';
export type { CatchUpPolicy, Milestone, MilestoneDriver, MilestoneOutcome } from './domain-driver.js';
export { MilestoneScheduler } from './milestone-scheduler.js';
export type { MilestoneSchedulerOptions } from './milestone-scheduler.js';
export { Runtime, createBacking } from './runtime.js';
export type { DomainStatus, RuntimeOptions, RuntimeStats, ScheduledDomain } from './runtime.js';
