import path from 'node:path';
import { envFlag, envInt, envString, BUILTIN_DEFAULTS } from './quoteDefaults';

export type FxSettings = {
  live: boolean;
  base: string;
  apiUrl: string;
  cacheMaxAgeSeconds: number;
  cachePath: string;
  staticRatesJson: string | null;
  timeoutMs: number;
};

export function getFxSettings(env: NodeJS.ProcessEnv = process.env): FxSettings {
  const base = envString(env, 'FX_BASE', envString(env, 'CURRENCY', BUILTIN_DEFAULTS.currency)).toUpperCase();
  const outputDir = envString(env, 'OUTPUT_DIR', BUILTIN_DEFAULTS.outputDir);
  const staticRatesJson = env.FX_RATES_JSON?.trim();
  return {
    live: envFlag(env, 'FX_LIVE'),
    base,
    apiUrl: envString(env, 'FX_API_URL', `https://open.er-api.com/v6/latest/${base}`),
    cacheMaxAgeSeconds: envInt(env, 'FX_CACHE_SECONDS', 3600),
    cachePath: path.join(outputDir, 'fx_cache.json'),
    staticRatesJson: staticRatesJson ? staticRatesJson : null,
    timeoutMs: 8000
  };
}
