import { formatMoney, formatPercent } from '../../../lib/numbers';
import type { AggregateResult, QuoteInputs, QuoteRecord, RenderData } from '../types';

export type AssembleOptions = {
  now?: Date;
  validDays: number;
  senderName: string;
  ids?: QuoteIdAllocator;
};

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Local calendar date as YYYY-MM-DD. */
export function formatIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

export function addDays(date: Date, days: number): Date {
  const next = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  next.setDate(next.getDate() + days);
  return next;
}

export function baseQuoteId(quoteDate: Date, quantity: number): string {
  const stamp = formatIsoDate(quoteDate).replace(/-/g, '');
  return `Q-${stamp}-${pad(quantity, 3)}`;
}

/**
 * Hands out quote ids of the form Q-YYYYMMDD-NNN. A repeat of the same date and
 * quantity within this process gets a numeric suffix (-2, -3, ...).
 * Only the current date's counters are kept; a new date starts from empty.
 */
export class QuoteIdAllocator {
  private day = '';
  private issued = new Map<string, number>();

  next(quoteDate: Date, quantity: number): string {
    const day = formatIsoDate(quoteDate);
    if (day !== this.day) {
      this.day = day;
      this.issued.clear();
    }
    const base = baseQuoteId(quoteDate, quantity);
    const count = (this.issued.get(base) ?? 0) + 1;
    this.issued.set(base, count);
    return count === 1 ? base : `${base}-${count}`;
  }
}

export function assembleQuote(inputs: QuoteInputs, priced: AggregateResult, options: AssembleOptions): QuoteRecord {
  const now = options.now ?? new Date();
  const quoteId = options.ids ? options.ids.next(now, inputs.quantity) : baseQuoteId(now, inputs.quantity);
  const quoteDate = formatIsoDate(now);
  const validUntil = formatIsoDate(addDays(now, options.validDays));
  const { summary } = priced;

  const renderData: RenderData = {
    fields: {
      company_name: inputs.companyName,
      quote_id: quoteId,
      quote_date: quoteDate,
      valid_until: validUntil,
      customer_name: inputs.customerName,
      customer_email: inputs.customerEmail,
      job_type: inputs.jobType,
      quantity: inputs.quantity,
      due_date: inputs.dueDate,
      currency: inputs.currency,
      labor_rate: formatMoney(priced.laborRate),
      labor_hours: summary.laborHours,
      labor_cost: summary.laborCost,
      materials_subtotal: summary.materialsSubtotal,
      subtotal: summary.subtotal,
      markup_pct: formatPercent(inputs.markupPct),
      markup_value: summary.markupValue,
      price_before_vat: summary.priceBeforeVat,
      vat_pct: formatPercent(inputs.vatPct),
      vat_value: summary.vatValue,
      total: summary.total,
      unit_price: summary.unitPrice,
      notes: `${inputs.notes} (Customer email: ${inputs.customerEmail})`,
      sender_name: options.senderName
    },
    lines: priced.lines.map((line) => ({
      name: line.name,
      qty: line.qty,
      unit: line.unit,
      unit_cost: line.unitCost,
      line_cost: line.lineCost
    }))
  };

  return { quoteId, quoteDate, validUntil, renderData };
}
