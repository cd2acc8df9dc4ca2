import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { FxSettings } from '../config/fx';
import type { FxRates } from '../domains/pricing';
import { errorMessage, FxConfigError } from '../lib/errors';
import { fetchWithTimeout, type FetchLike } from '../lib/integrationClient';
import { logQuoteEvent, QUOTE_EVENT } from '../observability/quote.events';

export type FxSource = 'live' | 'cached' | 'static' | 'fallback' | 'disabled';

export type LiveFailureReason = 'network' | 'http_status' | 'malformed';

export type FxLoadResult = {
  source: FxSource;
  rates: FxRates;
  /** why live rates were not used, when live mode is on and they were not */
  liveFailure?: { reason: LiveFailureReason; detail: string };
};

export type FxCacheSnapshot = {
  base: string;
  /** epoch seconds */
  timestamp: number;
  rates: FxRates;
};

type LiveFetchResult =
  | { ok: true; rates: FxRates }
  | { ok: false; reason: LiveFailureReason; detail: string };

const ratesSchema = z.record(z.string(), z.coerce.number().finite().positive());

const liveResponseSchema = z.object({
  rates: ratesSchema
});

const cacheSnapshotSchema = z.object({
  base: z.string(),
  timestamp: z.coerce.number(),
  rates: ratesSchema
});

function upperKeys(rates: Record<string, number>): FxRates {
  const normalized: FxRates = {};
  for (const [code, rate] of Object.entries(rates)) {
    normalized[code.trim().toUpperCase()] = rate;
  }
  return normalized;
}

export function parseStaticRates(raw: string): FxRates {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new FxConfigError('FX_RATES_JSON must be valid JSON mapping currency -> rate');
  }
  const result = ratesSchema.safeParse(parsed);
  if (!result.success) {
    throw new FxConfigError('FX_RATES_JSON must be valid JSON mapping currency -> rate');
  }
  return upperKeys(result.data);
}

/**
 * Returns cached rates when the snapshot has the same base and is younger
 * than `maxAgeSeconds`. Any unreadable snapshot counts as a miss.
 */
export async function readFxCache(
  cachePath: string,
  base: string,
  maxAgeSeconds: number,
  nowSeconds: number
): Promise<FxRates | null> {
  if (!cachePath || maxAgeSeconds <= 0) {
    return null;
  }
  let raw: string;
  try {
    raw = await fs.readFile(cachePath, 'utf-8');
  } catch {
    return null;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }
  const snapshot = cacheSnapshotSchema.safeParse(payload);
  if (!snapshot.success) {
    return null;
  }
  if (snapshot.data.base.toUpperCase() !== base) {
    return null;
  }
  if (nowSeconds - snapshot.data.timestamp > maxAgeSeconds) {
    return null;
  }
  return upperKeys(snapshot.data.rates);
}

export async function writeFxCache(cachePath: string, snapshot: FxCacheSnapshot): Promise<void> {
  await fs.mkdir(path.dirname(cachePath) || '.', { recursive: true });
  await fs.writeFile(cachePath, JSON.stringify(snapshot), 'utf-8');
}

export async function fetchLiveRates(
  apiUrl: string,
  base: string,
  options: { fetchImpl?: FetchLike; timeoutMs: number }
): Promise<LiveFetchResult> {
  let response: Response;
  try {
    response = await fetchWithTimeout(apiUrl, { method: 'GET' }, {
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl
    });
  } catch (error) {
    return { ok: false, reason: 'network', detail: errorMessage(error) };
  }
  if (!response.ok) {
    return { ok: false, reason: 'http_status', detail: `FX API responded with status ${response.status}` };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return { ok: false, reason: 'malformed', detail: errorMessage(error) };
  }
  const parsed = liveResponseSchema.safeParse(body);
  if (!parsed.success || Object.keys(parsed.data.rates).length === 0) {
    return { ok: false, reason: 'malformed', detail: 'FX API response has no usable rates' };
  }
  const rates = upperKeys(parsed.data.rates);
  if (rates[base] === undefined) {
    rates[base] = 1.0;
  }
  return { ok: true, rates };
}

export type FxRateProviderDeps = {
  fetchImpl?: FetchLike;
  /** epoch seconds */
  now?: () => number;
};

/**
 * Resolves the rate table for a quote: cache, then live fetch (when live mode
 * is on), then the configured static table, else nothing. Network trouble never
 * raises; a malformed FX_RATES_JSON does, since that is a configuration error.
 */
export class FxRateProvider {
  private readonly now: () => number;

  constructor(
    private readonly settings: FxSettings,
    private readonly deps: FxRateProviderDeps = {}
  ) {
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  }

  async load(): Promise<FxLoadResult> {
    const result = await this.resolve();
    logQuoteEvent(QUOTE_EVENT.FX_RATES_LOADED, {
      source: result.source,
      currencies: Object.keys(result.rates).length,
      liveFailure: result.liveFailure?.reason
    });
    return result;
  }

  async rates(): Promise<FxRates> {
    return (await this.load()).rates;
  }

  private async resolve(): Promise<FxLoadResult> {
    const { settings } = this;
    let liveFailure: FxLoadResult['liveFailure'];

    if (settings.live) {
      const cached = await readFxCache(settings.cachePath, settings.base, settings.cacheMaxAgeSeconds, this.now());
      if (cached) {
        return { source: 'cached', rates: cached };
      }
      const fetched = await fetchLiveRates(settings.apiUrl, settings.base, {
        fetchImpl: this.deps.fetchImpl,
        timeoutMs: settings.timeoutMs
      });
      if (fetched.ok) {
        await this.saveSnapshot(fetched.rates);
        return { source: 'live', rates: fetched.rates };
      }
      liveFailure = { reason: fetched.reason, detail: fetched.detail };
    }

    if (settings.staticRatesJson) {
      return { source: 'static', rates: parseStaticRates(settings.staticRatesJson), liveFailure };
    }

    if (liveFailure) {
      return { source: 'fallback', rates: {}, liveFailure };
    }
    return { source: 'disabled', rates: {} };
  }

  private async saveSnapshot(rates: FxRates): Promise<void> {
    try {
      await writeFxCache(this.settings.cachePath, {
        base: this.settings.base,
        timestamp: this.now(),
        rates
      });
    } catch (error) {
      logQuoteEvent(QUOTE_EVENT.FX_CACHE_WRITE_FAILED, {
        cachePath: this.settings.cachePath,
        error: errorMessage(error)
      });
    }
  }
}
