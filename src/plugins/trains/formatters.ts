import { escapeHtml } from '../../utils/format.js';
import type { Board, WatchSubscription } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TRAIN FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════════

function platformText(platform: string | null): string {
  return platform ?? '?';
}

function trainLabel(sub: Pick<WatchSubscription, 'trainIdentifier' | 'destination'>): string {
  return `the <b>${escapeHtml(sub.trainIdentifier)}</b> to <b>${escapeHtml(sub.destination)}</b>`;
}

export function formatBoard(board: Board): string {
  if (board.departures.length === 0) {
    return `⚠️ No departures found for ${escapeHtml(board.stationName)} (${board.crs}).`;
  }

  const lines = [`🚆 <b>Departures from ${escapeHtml(board.stationName)}</b> (${board.crs})`, ''];
  for (const d of board.departures) {
    const platform = d.platform ? ` [P${escapeHtml(d.platform)}]` : '';
    lines.push(`• ${escapeHtml(d.std)} to ${escapeHtml(d.destination)}: ${escapeHtml(d.etd)}${platform}`);
  }
  return lines.join('\n');
}

export function formatWatchStarted(sub: WatchSubscription): string {
  return (
    `🔔 Watching ${trainLabel(sub)} from ${sub.origin}.\n` +
    `Now: ${escapeHtml(sub.lastKnownStatus)}, platform ${escapeHtml(platformText(sub.lastKnownPlatform))}`
  );
}

export interface WatchDelta {
  platform?: { from: string | null; to: string | null };
  status?: { from: string; to: string };
}

export function formatChangeAlert(sub: WatchSubscription, delta: WatchDelta, final: boolean): string {
  const lines = [`⚠️ <b>Train update</b>: ${trainLabel(sub)}`];
  if (delta.platform) {
    lines.push(
      `Platform: ${escapeHtml(platformText(delta.platform.from))} → ${escapeHtml(platformText(delta.platform.to))}`,
    );
  }
  if (delta.status) {
    lines.push(`Status: ${escapeHtml(delta.status.from)} → ${escapeHtml(delta.status.to)}`);
  }
  if (final) lines.push('Watch ended.');
  return lines.join('\n');
}

export function formatVanishedAlert(sub: WatchSubscription): string {
  return `🚆 ${trainLabel(sub)} is no longer on the ${sub.origin} board. Watch ended.`;
}
