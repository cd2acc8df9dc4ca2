import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getQuoteDefaults, type QuoteDefaults } from '../config/quoteDefaults';
import { loadRecipeBook } from '../domains/pricing';
import { MissingMaterialsError, UnknownJobTypeError } from '../lib/errors';
import { quoteRequestSchema } from '../schemas/quotes.schema';
import { LocalBomSource } from './bomSource.service';
import { FxRateProvider } from './fxRates.service';
import { InMemoryMaterialCostStore, loadMaterialSeed } from './materials.service';
import { QuoteLogSink } from './quoteSinks.service';
import { QuoteService } from './quotes.service';

const NOW = new Date(2026, 9, 18, 9, 0);

let dir: string;
let defaults: QuoteDefaults;

async function makeService(options: { exclude?: string[] } = {}) {
  const rows = (await loadMaterialSeed()).filter((row) => !options.exclude?.includes(row.name));
  const fx = new FxRateProvider({
    live: false,
    base: 'GBP',
    apiUrl: 'https://fx.test/latest/GBP',
    cacheMaxAgeSeconds: 0,
    cachePath: path.join(dir, 'fx_cache.json'),
    staticRatesJson: null,
    timeoutMs: 1000
  });
  const service = new QuoteService({
    bomSource: new LocalBomSource(loadRecipeBook()),
    materials: InMemoryMaterialCostStore.fromSeedRows(rows),
    fx,
    defaults,
    sinks: [new QuoteLogSink(path.join(dir, 'quotes.log'))],
    now: () => NOW
  });
  return { service, fx };
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quote-service-'));
  defaults = getQuoteDefaults({ OUTPUT_DIR: dir });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('QuoteService.resolveInputs', () => {
  it('fills defaults from configuration', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(quoteRequestSchema.parse({ jobType: 'cupcakes', quantity: '100' }));
    expect(inputs).toEqual({
      jobType: 'cupcakes',
      quantity: 100,
      dueDate: 'TBD',
      companyName: 'Bakery Co.',
      customerName: 'Customer',
      customerEmail: 'customer@example.com',
      currency: 'GBP',
      laborRate: 15,
      markupPct: 0.3,
      vatPct: 0.2,
      notes: 'Please confirm delivery details.'
    });
  });

  it('normalizes percentages with and without an explicit unit', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(
      quoteRequestSchema.parse({
        jobType: 'cake',
        quantity: 2,
        currency: 'eur',
        markupPct: 25,
        vatPct: 1,
        vatUnit: 'percent'
      })
    );
    expect(inputs.currency).toBe('EUR');
    expect(inputs.markupPct).toBe(0.25);
    expect(inputs.vatPct).toBe(0.01);
  });
});

describe('QuoteService.computeQuote', () => {
  it('prices a quote against the seeded materials', async () => {
    const { service } = await makeService();
    const computed = await service.computeQuote(
      service.resolveInputs(quoteRequestSchema.parse({ jobType: 'cupcakes', quantity: 100 }))
    );
    expect(computed.summary.total).toBe('194.53');
    expect(computed.summary.unitPrice).toBe('1.95');
    expect(computed.lines).toHaveLength(7);
    expect(computed.warnings).toEqual([]);
    expect(computed.fx).toEqual({ source: 'disabled', liveFailure: undefined });
    expect(computed.estimate.laborHours).toBe(5);
  });

  it('rejects job types the BOM source does not know', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(quoteRequestSchema.parse({ jobType: 'bagels', quantity: 1 }));
    await expect(service.computeQuote(inputs)).rejects.toBeInstanceOf(UnknownJobTypeError);
  });

  it('reports every missing material without loading rates', async () => {
    const { service, fx } = await makeService({ exclude: ['eggs', 'milk'] });
    const load = vi.spyOn(fx, 'load');
    const inputs = service.resolveInputs(quoteRequestSchema.parse({ jobType: 'cupcakes', quantity: 10 }));

    const error = await service.computeQuote(inputs).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MissingMaterialsError);
    expect(error instanceof MissingMaterialsError && error.names).toEqual(['eggs', 'milk']);
    expect(load).not.toHaveBeenCalled();
  });

  it('warns instead of failing when a foreign currency has no rate', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(quoteRequestSchema.parse({ jobType: 'cupcakes', quantity: 1, currency: 'EUR' }));
    const computed = await service.computeQuote(inputs);
    expect(computed.warnings).toHaveLength(8);
    expect(computed.warnings[7]).toBe('Labor rate in GBP but quote currency is EUR: Missing FX rate for GBP or EUR');
  });
});

describe('QuoteService.buildQuote', () => {
  it('renders the documents and delivers to the sinks', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(
      quoteRequestSchema.parse({ jobType: 'cupcakes', quantity: 100, companyName: 'Crumb & Co' })
    );

    const built = await service.buildQuote(inputs);

    expect(built.record.quoteId).toBe('Q-20261018-100');
    expect(built.record.validUntil).toBe('2026-11-01');
    expect(built.deliveries).toEqual(['quote-log: sent']);
    expect(built.files.markdownPath).toBe(path.join(dir, 'quote_Q-20261018-100.md'));

    const lines = built.markdown.split('\n');
    expect(lines[0]).toBe('# Crumb & Co — Quotation');
    expect(lines).toContain('| flour | 8 | kg | 1.20 | 9.60 |');
    expect(lines).toContain('| Labor (@ 15.00/h) | 5 | h | | 75.00 |');
    expect(lines).toContain('- **Total: 194.53 GBP**');
    expect(lines).toContain('- Markup (30%): 37.41 GBP');
    expect(await fs.readFile(built.files.markdownPath, 'utf-8')).toBe(built.markdown);

    const log = await fs.readFile(path.join(dir, 'quotes.log'), 'utf-8');
    expect(log.trim().split('\n')).toHaveLength(1);
  });

  it('suffixes a second quote with the same date and quantity', async () => {
    const { service } = await makeService();
    const inputs = service.resolveInputs(quoteRequestSchema.parse({ jobType: 'cake', quantity: 3 }));
    const first = await service.buildQuote(inputs);
    const second = await service.buildQuote(inputs, first.computed);
    expect(first.record.quoteId).toBe('Q-20261018-003');
    expect(second.record.quoteId).toBe('Q-20261018-003-2');
  });
});
