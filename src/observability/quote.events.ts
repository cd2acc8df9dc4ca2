import { getRequestContext } from '../lib/requestContext';

export const QUOTE_EVENT = {
  FX_RATES_LOADED: 'FX_RATES_LOADED',
  FX_CACHE_WRITE_FAILED: 'FX_CACHE_WRITE_FAILED',
  JOB_TYPES_FALLBACK: 'JOB_TYPES_FALLBACK',
  QUOTE_COMPUTED: 'QUOTE_COMPUTED',
  QUOTE_BUILT: 'QUOTE_BUILT',
  QUOTE_SINK_FAILED: 'QUOTE_SINK_FAILED',
  MATERIAL_COST_UPDATED: 'MATERIAL_COST_UPDATED'
} as const;

export type QuoteEventName = (typeof QUOTE_EVENT)[keyof typeof QUOTE_EVENT];

type QuoteEventEntry = {
  event: QuoteEventName;
  requestId?: string;
  admin: boolean;
  timestamp: string;
} & Record<string, unknown>;

export function logQuoteEvent(event: QuoteEventName, payload: Record<string, unknown> = {}): void {
  const context = getRequestContext();
  const entry: QuoteEventEntry = {
    ...payload,
    event,
    requestId: context?.requestId,
    admin: context?.isAdmin === true,
    timestamp: new Date().toISOString()
  };
  const line = JSON.stringify(entry);
  if (event === QUOTE_EVENT.QUOTE_SINK_FAILED || event === QUOTE_EVENT.FX_CACHE_WRITE_FAILED) {
    console.warn(line);
    return;
  }
  console.log(line);
}
