import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// BIN SCHEDULE PLUGIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const CollectionSchema = z.object({
  type: z.string().min(1),
  /** Local calendar date, yyyy-MM-dd. */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});
export type Collection = z.infer<typeof CollectionSchema>;

export const BinStateSchema = z.object({
  schedule: z.array(CollectionSchema),
  fetchedAt: z.string().datetime().nullable(),
  /** Instant of the last milestone handled (alerted, discarded or refreshed). Never moves back. */
  lastNotifiedMilestone: z.string().datetime().nullable(),
});
export type BinState = z.infer<typeof BinStateSchema>;

export type BinMilestoneKind = 'night-before' | 'morning-of' | 'refresh';

export interface BinMilestonePayload {
  kind: BinMilestoneKind;
  /** Null for a fallback refresh when no collection is left in the cache. */
  collectionDate: string | null;
  types: string[];
}

export interface BinOptions {
  nightBefore: string;
  morningOf: string;
  refreshAt: string;
  staleGraceMinutes: number;
  /** Minimum gap between fallback refreshes when the cache has nothing upcoming. */
  retryDelayMs: number;
}

// ── Feed wire format ─────────────────────────────────────────────────

export const FeedEntrySchema = z.object({
  type: z.string().min(1),
  date: z.string().min(1),
});

export const FeedResponseSchema = z.union([
  z.array(FeedEntrySchema),
  z.object({ collections: z.array(FeedEntrySchema) }),
]);
