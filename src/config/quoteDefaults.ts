import { normalizePercent } from '../lib/numbers';

export type QuoteDefaults = {
  laborRate: number;
  markupPct: number;
  vatPct: number;
  currency: string;
  bomApiUrl: string | null;
  databaseUrl: string | null;
  templatePath: string;
  outputDir: string;
  quoteValidDays: number;
  senderName: string;
};

export const BUILTIN_DEFAULTS = {
  laborRate: 15.0,
  markupPercent: 30,
  vatPercent: 20,
  currency: 'GBP',
  templatePath: 'templates/quote_template.md',
  outputDir: 'out',
  quoteValidDays: 14,
  senderName: 'Bakery Nation'
} as const;

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function envString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  return readString(env, name) ?? fallback;
}

export function envFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number`);
  }
  return value;
}

export function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${name} must be an integer`);
  }
  return Number(raw);
}

export function envFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  const normalized = String(env[name] ?? '').trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

/**
 * Markup and VAT accept either form in the environment (30 or 0.3).
 */
export function getQuoteDefaults(env: NodeJS.ProcessEnv = process.env): QuoteDefaults {
  return {
    laborRate: envFloat(env, 'LABOR_RATE', BUILTIN_DEFAULTS.laborRate),
    markupPct: normalizePercent(envFloat(env, 'MARKUP_PCT', BUILTIN_DEFAULTS.markupPercent)),
    vatPct: normalizePercent(envFloat(env, 'VAT_PCT', BUILTIN_DEFAULTS.vatPercent)),
    currency: envString(env, 'CURRENCY', BUILTIN_DEFAULTS.currency).toUpperCase(),
    bomApiUrl: readString(env, 'BOM_API_URL') ?? null,
    databaseUrl: readString(env, 'DATABASE_URL') ?? null,
    templatePath: envString(env, 'TEMPLATE_PATH', BUILTIN_DEFAULTS.templatePath),
    outputDir: envString(env, 'OUTPUT_DIR', BUILTIN_DEFAULTS.outputDir),
    quoteValidDays: envInt(env, 'QUOTE_VALID_DAYS', BUILTIN_DEFAULTS.quoteValidDays),
    senderName: envString(env, 'SENDER_NAME', BUILTIN_DEFAULTS.senderName)
  };
}
