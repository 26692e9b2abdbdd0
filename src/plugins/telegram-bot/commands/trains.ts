import type { Context } from 'grammy';

import { formatBoard, formatWatchStarted } from '../../trains/index.js';
import type { WatchRequest } from '../../trains/index.js';
import { escapeHtml } from '../../../utils/format.js';
import type { TrainServices } from '../types.js';
import { commandArgs, contextIdOf, replyDisabled, replyError, replyHtml } from './reply.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /trains /watch /unwatch /shortcut /shortcuts — live departures
// ═══════════════════════════════════════════════════════════════════════════════

const TIME_ARG = /^\d{1,2}:?\d{2}$/;

/** "/watch", "/watch 08:15", "/watch home", "/watch 08:15 WAT" */
export function parseWatchArgs(args: string[]): WatchRequest {
  const [first, second] = args;
  if (!first) return {};
  if (TIME_ARG.test(first)) {
    return second ? { trainIdentifier: first, station: second } : { trainIdentifier: first };
  }
  return { station: first };
}

export async function handleTrains(ctx: Context, trains: TrainServices | null): Promise<void> {
  if (!trains) return replyDisabled(ctx, 'Train departures');

  const [station] = commandArgs(ctx);
  try {
    const session = trains.sessions.get(contextIdOf(ctx));
    const board = await trains.watch.board(session, station);
    await replyHtml(ctx, formatBoard(board));
  } catch (error) {
    await replyError(ctx, 'trains', error);
  }
}

export async function handleWatch(ctx: Context, trains: TrainServices | null): Promise<void> {
  if (!trains) return replyDisabled(ctx, 'Train watch');

  try {
    const session = trains.sessions.get(contextIdOf(ctx));
    const subscription = await trains.watch.watch(session, parseWatchArgs(commandArgs(ctx)));
    await replyHtml(ctx, formatWatchStarted(subscription));
  } catch (error) {
    await replyError(ctx, 'watch', error);
  }
}

export async function handleUnwatch(ctx: Context, trains: TrainServices | null): Promise<void> {
  if (!trains) return replyDisabled(ctx, 'Train watch');

  const cleared = trains.watch.unwatch(contextIdOf(ctx));
  await ctx.reply(cleared ? `🔕 Stopped watching the ${cleared.trainIdentifier}.` : 'Nothing is being watched.');
}

export async function handleShortcut(ctx: Context, trains: TrainServices | null): Promise<void> {
  if (!trains) return replyDisabled(ctx, 'Train departures');

  const [action, name, crs] = commandArgs(ctx);
  try {
    if (action === 'add' && name && crs) {
      const added = await trains.shortcuts.add(name, crs);
      await replyHtml(ctx, `📍 Shortcut <b>${escapeHtml(added.name)}</b> → ${added.crs}`);
      return;
    }
    if (action === 'remove' && name) {
      const removed = await trains.shortcuts.remove(name);
      await replyHtml(
        ctx,
        removed ? `🗑 Shortcut <b>${escapeHtml(name.toLowerCase())}</b> removed.` : `No shortcut named <b>${escapeHtml(name)}</b>.`,
      );
      return;
    }
    await ctx.reply('Usage: /shortcut add <name> <CRS> | /shortcut remove <name>');
  } catch (error) {
    await replyError(ctx, 'shortcut', error);
  }
}

export async function handleShortcuts(ctx: Context, trains: TrainServices | null): Promise<void> {
  if (!trains) return replyDisabled(ctx, 'Train departures');

  try {
    const shortcuts = await trains.shortcuts.list();
    if (shortcuts.length === 0) {
      await ctx.reply('No shortcuts yet. Add one with /shortcut add home WAT');
      return;
    }
    const lines = ['📍 <b>Station shortcuts</b>', ...shortcuts.map((s) => `• ${escapeHtml(s.name)} → ${s.crs}`)];
    await replyHtml(ctx, lines.join('\n'));
  } catch (error) {
    await replyError(ctx, 'shortcuts', error);
  }
}
