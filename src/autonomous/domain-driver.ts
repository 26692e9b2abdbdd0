import { randomUUID } from 'node:crypto';
import type { z } from 'zod';

import type { Alert, AlertSeverity, DomainName } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DOMAIN DRIVER CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * How missed milestones are handled at startup:
 * - replay: apply the cumulative effect of every missed milestone once
 * - discard: skip missed milestones without alerting and resync
 */
export type CatchUpPolicy = 'replay' | 'discard';

/** Derived from state on demand; never persisted. */
export interface Milestone<P> {
  at: Date;
  payload: P;
}

export interface MilestoneOutcome<S> {
  /** The input state object itself when nothing changed. */
  state: S;
  alerts: Alert[];
}

export interface MilestoneDriver<S, P = unknown> {
  readonly kind: DomainName;
  readonly catchUpPolicy: CatchUpPolicy;
  readonly schema: z.ZodType<S, z.ZodTypeDef, unknown>;
  readonly schemaVersion: number;

  defaultState(now: Date): S;

  /** Always returns a milestone; a past instant means "run now". */
  nextMilestone(state: S, now: Date): Milestone<P>;

  /**
   * Evaluate the milestone that is due at `now`. Called on the latest
   * persisted state, so it must tolerate being woken early.
   */
  onMilestone(state: S, now: Date): MilestoneOutcome<S> | Promise<MilestoneOutcome<S>>;

  /** Startup catch-up. Must be idempotent for a fixed `now`. */
  reconcile(state: S, now: Date): MilestoneOutcome<S> | Promise<MilestoneOutcome<S>>;
}

export function unchanged<S>(state: S): MilestoneOutcome<S> {
  return { state, alerts: [] };
}

export function createAlert(
  domain: DomainName,
  renderedPayload: string,
  options: { now: Date; severity?: AlertSeverity; recipientId?: string },
): Alert {
  const alert: Alert = {
    id: randomUUID(),
    domain,
    renderedPayload,
    createdAt: options.now.toISOString(),
  };
  if (options.severity) alert.severity = options.severity;
  if (options.recipientId) alert.recipientId = options.recipientId;
  return alert;
}
