import type { Context } from 'grammy';

import { formatDuration } from '../../../utils/format.js';
import type { StatusSource } from '../types.js';
import { replyError, replyHtml } from './reply.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /status — domain overview
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleStatus(ctx: Context, source: StatusSource, now: Date = new Date()): Promise<void> {
  try {
    const domains = await source.status();
    const stats = source.getStats();

    const lines = ['<b>Status</b>', ''];
    for (const d of domains) {
      const next = d.nextMilestone ? ` · next in ${formatDuration(d.nextMilestone.getTime() - now.getTime())}` : '';
      lines.push(`• <b>${d.domain}</b>: ${d.summary}${next}`);
    }
    if (domains.length === 0) {
      lines.push('No domains enabled.');
    }

    lines.push('');
    if (stats.startedAt) {
      lines.push(`Uptime: ${formatDuration(now.getTime() - stats.startedAt.getTime())}`);
    }
    lines.push(`Alerts: ${stats.alertsDelivered} delivered, ${stats.alertsDropped} dropped`);

    await replyHtml(ctx, lines.join('\n'));
  } catch (error) {
    await replyError(ctx, 'status', error);
  }
}
