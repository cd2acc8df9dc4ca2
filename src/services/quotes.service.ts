import fs from 'node:fs/promises';
import path from 'node:path';
import type { QuoteDefaults } from '../config/quoteDefaults';
import {
  aggregateCosts,
  assembleQuote,
  findMissingMaterials,
  QuoteIdAllocator,
  type AggregateResult,
  type BomEstimate,
  type QuoteInputs,
  type QuoteRecord
} from '../domains/pricing';
import { MissingMaterialsError, UnknownJobTypeError } from '../lib/errors';
import { normalizePercent } from '../lib/numbers';
import { logQuoteEvent, QUOTE_EVENT } from '../observability/quote.events';
import type { QuoteRequest } from '../schemas/quotes.schema';
import type { BomSource, JobTypeList } from './bomSource.service';
import type { FxLoadResult, FxRateProvider } from './fxRates.service';
import type { MaterialCostStore } from './materials.service';
import { renderTemplate, writeQuoteDocuments, type QuoteDocumentPaths } from './quoteDocuments.service';
import { dispatchQuote, type QuoteSink } from './quoteSinks.service';

export const INPUT_DEFAULTS = {
  dueDate: 'TBD',
  companyName: 'Bakery Co.',
  customerName: 'Customer',
  customerEmail: 'customer@example.com',
  notes: 'Please confirm delivery details.'
} as const;

export type ComputedQuote = AggregateResult & {
  estimate: BomEstimate;
  fx: Pick<FxLoadResult, 'source' | 'liveFailure'>;
};

export type BuiltQuote = {
  record: QuoteRecord;
  markdown: string;
  files: QuoteDocumentPaths;
  computed: ComputedQuote;
  deliveries: string[];
};

export type QuoteServiceDeps = {
  bomSource: BomSource;
  materials: MaterialCostStore;
  fx: FxRateProvider;
  defaults: QuoteDefaults;
  sinks?: QuoteSink[];
  ids?: QuoteIdAllocator;
  now?: () => Date;
};

export class QuoteService {
  private readonly ids: QuoteIdAllocator;
  private readonly now: () => Date;

  constructor(private readonly deps: QuoteServiceDeps) {
    this.ids = deps.ids ?? new QuoteIdAllocator();
    this.now = deps.now ?? (() => new Date());
  }

  get defaults(): QuoteDefaults {
    return this.deps.defaults;
  }

  listJobTypes(): Promise<JobTypeList> {
    return this.deps.bomSource.listJobTypes();
  }

  /** Fills unset request fields from configuration and normalizes percentages. */
  resolveInputs(request: QuoteRequest): QuoteInputs {
    const { defaults } = this.deps;
    return {
      jobType: request.jobType,
      quantity: request.quantity,
      dueDate: request.dueDate ?? INPUT_DEFAULTS.dueDate,
      companyName: request.companyName ?? INPUT_DEFAULTS.companyName,
      customerName: request.customerName ?? INPUT_DEFAULTS.customerName,
      customerEmail: request.customerEmail ?? INPUT_DEFAULTS.customerEmail,
      currency: (request.currency ?? defaults.currency).toUpperCase(),
      laborRate: request.laborRate ?? defaults.laborRate,
      markupPct: request.markupPct === undefined ? defaults.markupPct : normalizePercent(request.markupPct, request.markupUnit),
      vatPct: request.vatPct === undefined ? defaults.vatPct : normalizePercent(request.vatPct, request.vatUnit),
      notes: request.notes ?? INPUT_DEFAULTS.notes
    };
  }

  async computeQuote(inputs: QuoteInputs): Promise<ComputedQuote> {
    const { jobTypes } = await this.listJobTypes();
    if (!jobTypes.includes(inputs.jobType)) {
      throw new UnknownJobTypeError(inputs.jobType, jobTypes);
    }

    const estimate = await this.deps.bomSource.estimate(inputs.jobType, inputs.quantity);
    const costs = await this.deps.materials.batchGet(estimate.materials.map((material) => material.name));
    const missing = findMissingMaterials(estimate, costs);
    if (missing.length > 0) {
      throw new MissingMaterialsError(missing);
    }

    const fx = await this.deps.fx.load();
    const priced = aggregateCosts(inputs, estimate, costs, fx.rates, {
      baseCurrency: this.deps.defaults.currency
    });

    logQuoteEvent(QUOTE_EVENT.QUOTE_COMPUTED, {
      jobType: inputs.jobType,
      quantity: inputs.quantity,
      currency: inputs.currency,
      total: priced.summary.total,
      warnings: priced.warnings.length,
      fxSource: fx.source
    });

    return {
      ...priced,
      estimate,
      fx: { source: fx.source, liveFailure: fx.liveFailure }
    };
  }

  /**
   * Prices (unless `computed` is supplied), renders the documents into the
   * output directory and hands the result to every configured sink.
   */
  async buildQuote(inputs: QuoteInputs, computed?: ComputedQuote): Promise<BuiltQuote> {
    const priced = computed ?? (await this.computeQuote(inputs));
    const { defaults } = this.deps;

    const record = assembleQuote(inputs, priced, {
      now: this.now(),
      validDays: defaults.quoteValidDays,
      senderName: defaults.senderName,
      ids: this.ids
    });

    const template = await fs.readFile(path.resolve(defaults.templatePath), 'utf-8');
    const markdown = renderTemplate(template, record.renderData);
    const files = await writeQuoteDocuments(defaults.outputDir, record, markdown);

    const deliveries = await dispatchQuote(this.deps.sinks ?? [], {
      record,
      warnings: priced.warnings,
      files: [files.markdownPath, files.textPath, files.pdfPath]
    });

    logQuoteEvent(QUOTE_EVENT.QUOTE_BUILT, {
      quoteId: record.quoteId,
      total: priced.summary.total,
      currency: inputs.currency,
      deliveries
    });

    return { record, markdown, files, computed: priced, deliveries };
  }
}
