import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// TRAIN WATCH PLUGIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const CrsSchema = z.string().regex(/^[A-Z]{3}$/, 'expected a 3-letter station code');

/** Durable train-domain record: station shortcuts only. */
export const TrainStateSchema = z.object({
  shortcuts: z.record(z.string(), CrsSchema),
});
export type TrainState = z.infer<typeof TrainStateSchema>;

export interface Departure {
  serviceId: string;
  /** Scheduled time, HH:mm. */
  std: string;
  /** Expected time or status text: "On time", "08:20", "Delayed", "Cancelled", "Departed". */
  etd: string;
  platform: string | null;
  destination: string;
}

export interface Board {
  crs: string;
  stationName: string;
  departures: Departure[];
}

export interface WatchSubscription {
  /** Chat that created the watch; alerts go back to it. */
  contextId: string;
  /** Scheduled departure time the user asked for, HH:mm. */
  trainIdentifier: string;
  serviceId: string | null;
  origin: string;
  destination: string;
  lastKnownPlatform: string | null;
  lastKnownStatus: string;
  createdAt: string;
}

/** Per-chat soft state. Lives in memory only and resets on restart. */
export interface SessionContext {
  contextId: string;
  lastStation?: string;
  lastBoard?: Board;
}

export interface TrainOptions {
  defaultStation?: string;
  pollIntervalMs: number;
  boardSize: number;
}

// ── Departure board wire format ──────────────────────────────────────

export const BoardResponseSchema = z.object({
  locationName: z.string(),
  crs: z.string(),
  trainServices: z
    .array(
      z.object({
        std: z.string(),
        etd: z.string(),
        platform: z.string().nullish(),
        serviceID: z.string(),
        destination: z.array(z.object({ locationName: z.string() })).default([]),
      }),
    )
    .nullish(),
});
