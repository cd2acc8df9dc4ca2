import fs from 'node:fs/promises';
import path from 'node:path';
import type { QuoteRecord } from '../domains/pricing';
import { errorMessage } from '../lib/errors';
import { logQuoteEvent, QUOTE_EVENT } from '../observability/quote.events';

export type DeliveredQuote = {
  record: QuoteRecord;
  warnings: string[];
  files: string[];
};

export interface QuoteSink {
  readonly name: string;
  deliver(quote: DeliveredQuote): Promise<void>;
}

/**
 * Runs every sink in order. A sink failure is reported in the returned status
 * list and logged; it never fails the quote that was already built.
 */
export async function dispatchQuote(sinks: QuoteSink[], quote: DeliveredQuote): Promise<string[]> {
  const statuses: string[] = [];
  for (const sink of sinks) {
    try {
      await sink.deliver(quote);
      statuses.push(`${sink.name}: sent`);
    } catch (error) {
      const message = errorMessage(error);
      statuses.push(`${sink.name}: failed (${message})`);
      logQuoteEvent(QUOTE_EVENT.QUOTE_SINK_FAILED, {
        sink: sink.name,
        quoteId: quote.record.quoteId,
        error: message
      });
    }
  }
  return statuses;
}

export const QUOTE_LOG_COLUMNS = [
  'quote_id',
  'quote_date',
  'valid_until',
  'company_name',
  'customer_name',
  'customer_email',
  'job_type',
  'quantity',
  'currency',
  'labor_cost',
  'markup_pct',
  'markup_value',
  'vat_pct',
  'vat_value',
  'total',
  'unit_price'
] as const;

/**
 * Appends one JSON line per quote to a log file: the local counterpart of
 * appending a row to a shared spreadsheet.
 */
export class QuoteLogSink implements QuoteSink {
  readonly name = 'quote-log';

  constructor(private readonly logPath: string) {}

  async deliver(quote: DeliveredQuote): Promise<void> {
    const { fields } = quote.record.renderData;
    const row: Record<string, string | number> = {};
    for (const column of QUOTE_LOG_COLUMNS) {
      row[column] = fields[column] ?? '';
    }
    row.warnings = quote.warnings.join(', ');
    await fs.mkdir(path.dirname(this.logPath) || '.', { recursive: true });
    await fs.appendFile(this.logPath, `${JSON.stringify(row)}\n`, 'utf-8');
  }
}
