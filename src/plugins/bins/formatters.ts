import { format, parse } from 'date-fns';

import { escapeHtml } from '../../utils/format.js';
import type { BinMilestoneKind, Collection } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// BIN FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════════

const REMINDER_TITLES: Record<Exclude<BinMilestoneKind, 'refresh'>, string> = {
  'night-before': '🌙 <b>Night before</b> bin reminder',
  'morning-of': '☀️ <b>Morning of</b> bin reminder',
};

export function formatCollectionDate(date: string): string {
  return format(parse(date, 'yyyy-MM-dd', new Date()), 'EEEE d MMMM');
}

export function formatReminder(kind: Exclude<BinMilestoneKind, 'refresh'>, types: string[]): string {
  return `${REMINDER_TITLES[kind]}\nItems: <b>${escapeHtml(types.join(', '))}</b>`;
}

export function formatSchedule(schedule: Collection[]): string {
  if (schedule.length === 0) {
    return '⚠️ No collection dates available yet.';
  }

  const lines = ['🚛 <b>Upcoming collections</b>', ''];
  for (const item of schedule) {
    lines.push(`• <b>${escapeHtml(item.type)}</b>: ${formatCollectionDate(item.date)}`);
  }
  return lines.join('\n');
}
