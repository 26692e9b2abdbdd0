import { UnavailableError } from '../../kernel/errors.js';
import { createLogger } from '../../kernel/logger.js';
import { BoardResponseSchema } from './types.js';
import type { Board } from './types.js';

const log = createLogger('rail-client');

// ═══════════════════════════════════════════════════════════════════════════════
// DEPARTURE BOARD API CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

const TIMEOUT_MS = 10_000;
const PROVIDER = 'departure board';

export interface DepartureProvider {
  departures(crs: string, rows: number): Promise<Board>;
}

/**
 * Client for a JSON departure board service
 * (`GET {apiUrl}/departures/{crs}/{rows}`).
 */
export class RailClient implements DepartureProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly apiUrl: string,
    private readonly accessToken?: string,
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  /**
   * @throws UnavailableError on network, HTTP or format failure
   */
  async departures(crs: string, rows: number): Promise<Board> {
    const url = new URL(`${this.apiUrl.replace(/\/$/, '')}/departures/${encodeURIComponent(crs)}/${rows}`);
    if (this.accessToken) {
      url.searchParams.set('accessToken', this.accessToken);
    }

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, {
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

    const parsed = BoardResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnavailableError(PROVIDER, `unexpected response shape: ${parsed.error.message}`);
    }

    const board: Board = {
      crs: parsed.data.crs.toUpperCase(),
      stationName: parsed.data.locationName,
      departures: (parsed.data.trainServices ?? []).map((service) => ({
        serviceId: service.serviceID,
        std: service.std,
        etd: service.etd,
        platform: service.platform ?? null,
        destination: service.destination.map((d) => d.locationName).join(' & ') || 'Unknown',
      })),
    };

    log.debug({ crs, departures: board.departures.length }, 'Departure board fetched');
    return board;
  }
}
