import type { Context } from 'grammy';

import { formatSchedule } from '../../bins/index.js';
import type { BinScheduleService } from '../../bins/index.js';
import { replyDisabled, replyError, replyHtml } from './reply.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /bins — upcoming collections
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleBins(ctx: Context, bins: BinScheduleService | null): Promise<void> {
  if (!bins) return replyDisabled(ctx, 'Bin reminders');

  try {
    const upcoming = await bins.upcoming();
    await replyHtml(ctx, formatSchedule(upcoming));
  } catch (error) {
    await replyError(ctx, 'bins', error);
  }
}
