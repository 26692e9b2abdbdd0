import { addYears, format, isValid, parse, startOfDay, subDays } from 'date-fns';

import { UnavailableError } from '../../kernel/errors.js';
import { createLogger } from '../../kernel/logger.js';
import { FeedResponseSchema } from './types.js';
import type { Collection } from './types.js';

const log = createLogger('bin-feed');

// ═══════════════════════════════════════════════════════════════════════════════
// BIN COLLECTION FEED CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

const TIMEOUT_MS = 15_000;
const PROVIDER = 'bin feed';

const WEEKDAY_PREFIX = /^(mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?\s+/i;
const TEXT_FORMATS_WITH_YEAR = ['d MMMM yyyy', 'd MMM yyyy'];
const TEXT_FORMATS = ['d MMMM', 'd MMM'];

/**
 * Normalise a feed date to yyyy-MM-dd.
 *
 * Accepts ISO dates and council text such as "Friday 2nd January",
 * "Sat, 3 Jan 2026" or "Monday 5th January (tomorrow)". Text without a
 * year takes the year of `now`, rolling into next year when that lands
 * more than two days in the past.
 */
export function parseCollectionDate(text: string, now: Date): string | null {
  const trimmed = text.trim();
  if (/^\d{4}-\d{2}-\d{2}/.test(trimmed)) {
    const iso = trimmed.slice(0, 10);
    return isValid(parse(iso, 'yyyy-MM-dd', now)) ? iso : null;
  }

  const cleaned = trimmed
    .split('(')[0]
    .replace(/,/g, ' ')
    .replace(/(\d+)(st|nd|rd|th)\b/gi, '$1')
    .replace(WEEKDAY_PREFIX, '')
    .replace(/\s+/g, ' ')
    .trim();

  for (const pattern of TEXT_FORMATS_WITH_YEAR) {
    const parsed = parse(cleaned, pattern, now);
    if (isValid(parsed)) return format(parsed, 'yyyy-MM-dd');
  }

  for (const pattern of TEXT_FORMATS) {
    let parsed = parse(cleaned, pattern, now);
    if (!isValid(parsed)) continue;
    if (parsed < subDays(startOfDay(now), 2)) {
      parsed = addYears(parsed, 1);
    }
    return format(parsed, 'yyyy-MM-dd');
  }

  return null;
}

export interface BinFeedClientOptions {
  ignoreTypes?: string[];
  fetchImpl?: typeof fetch;
}

/**
 * Reads the collection schedule from a JSON feed: either an array of
 * `{ type, date }` or `{ collections: [...] }`.
 */
export class BinFeedClient {
  private readonly ignoreTypes: string[];
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly feedUrl: string,
    options: BinFeedClientOptions = {},
  ) {
    this.ignoreTypes = (options.ignoreTypes ?? []).map((t) => t.toLowerCase());
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @throws UnavailableError on network, HTTP or format failure
   */
  async fetchSchedule(now: Date): Promise<Collection[]> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(this.feedUrl, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new UnavailableError(PROVIDER, `HTTP ${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof UnavailableError) throw error;
      throw new UnavailableError(PROVIDER, error instanceof Error ? error.message : String(error), error);
    }

    const parsed = FeedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnavailableError(PROVIDER, `unexpected response shape: ${parsed.error.message}`);
    }
    const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.collections;

    const collections: Collection[] = [];
    for (const entry of entries) {
      const type = entry.type.trim();
      if (this.isIgnored(type)) continue;

      const date = parseCollectionDate(entry.date, now);
      if (!date) {
        log.warn({ type, date: entry.date }, 'Skipping collection with unrecognised date');
        continue;
      }
      collections.push({ type, date });
    }

    collections.sort((a, b) => a.date.localeCompare(b.date) || a.type.localeCompare(b.type));
    log.info({ collections: collections.length }, 'Bin schedule fetched');
    return collections;
  }

  private isIgnored(type: string): boolean {
    const lower = type.toLowerCase();
    return this.ignoreTypes.some((ignored) => lower.includes(ignored));
  }
}
