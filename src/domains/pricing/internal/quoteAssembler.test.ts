import { describe, expect, it } from 'vitest';
import type { AggregateResult, QuoteInputs } from '../types';
import { addDays, assembleQuote, baseQuoteId, formatIsoDate, QuoteIdAllocator } from './quoteAssembler';

const now = new Date(2026, 9, 18, 10, 30);

const inputs: QuoteInputs = {
  jobType: 'cupcakes',
  quantity: 100,
  dueDate: '2026-10-25',
  companyName: 'Bakery Co.',
  customerName: 'Customer',
  customerEmail: 'customer@example.com',
  currency: 'GBP',
  laborRate: 15,
  markupPct: 0.3,
  vatPct: 0.2,
  notes: 'Please confirm delivery details.'
};

const priced: AggregateResult = {
  lines: [{ name: 'flour', qty: 8, unit: 'kg', unitCost: '1.20', lineCost: '9.60' }],
  summary: {
    materialsSubtotal: '9.60',
    laborCost: '75.00',
    laborHours: 5,
    subtotal: '84.60',
    markupValue: '25.38',
    priceBeforeVat: '109.98',
    vatValue: '22.00',
    total: '131.98',
    unitPrice: '1.32'
  },
  warnings: [],
  laborRate: 15
};

describe('quote ids and dates', () => {
  it('formats the local calendar date', () => {
    expect(formatIsoDate(now)).toBe('2026-10-18');
  });

  it('adds calendar days across a month boundary', () => {
    expect(formatIsoDate(addDays(now, 14))).toBe('2026-11-01');
  });

  it('pads the quantity to three digits', () => {
    expect(baseQuoteId(now, 100)).toBe('Q-20261018-100');
    expect(baseQuoteId(now, 5)).toBe('Q-20261018-005');
    expect(baseQuoteId(now, 1234)).toBe('Q-20261018-1234');
  });

  it('suffixes repeated ids within one allocator', () => {
    const ids = new QuoteIdAllocator();
    expect(ids.next(now, 100)).toBe('Q-20261018-100');
    expect(ids.next(now, 100)).toBe('Q-20261018-100-2');
    expect(ids.next(now, 50)).toBe('Q-20261018-050');
    expect(ids.next(now, 100)).toBe('Q-20261018-100-3');
  });

  it('starts counting afresh when the date moves on', () => {
    const ids = new QuoteIdAllocator();
    const tomorrow = new Date(2026, 9, 19, 9, 0);
    expect(ids.next(now, 100)).toBe('Q-20261018-100');
    expect(ids.next(now, 100)).toBe('Q-20261018-100-2');
    expect(ids.next(tomorrow, 100)).toBe('Q-20261019-100');
    expect(ids.next(tomorrow, 100)).toBe('Q-20261019-100-2');
    // previous day's counters are gone once the date has changed
    expect(ids.next(now, 100)).toBe('Q-20261018-100');
  });
});

describe('assembleQuote', () => {
  it('builds the record and render fields', () => {
    const record = assembleQuote(inputs, priced, { now, validDays: 14, senderName: 'Bakery Nation' });

    expect(record.quoteId).toBe('Q-20261018-100');
    expect(record.quoteDate).toBe('2026-10-18');
    expect(record.validUntil).toBe('2026-11-01');
    expect(record.renderData.fields).toEqual({
      company_name: 'Bakery Co.',
      quote_id: 'Q-20261018-100',
      quote_date: '2026-10-18',
      valid_until: '2026-11-01',
      customer_name: 'Customer',
      customer_email: 'customer@example.com',
      job_type: 'cupcakes',
      quantity: 100,
      due_date: '2026-10-25',
      currency: 'GBP',
      labor_rate: '15.00',
      labor_hours: 5,
      labor_cost: '75.00',
      materials_subtotal: '9.60',
      subtotal: '84.60',
      markup_pct: '30%',
      markup_value: '25.38',
      price_before_vat: '109.98',
      vat_pct: '20%',
      vat_value: '22.00',
      total: '131.98',
      unit_price: '1.32',
      notes: 'Please confirm delivery details. (Customer email: customer@example.com)',
      sender_name: 'Bakery Nation'
    });
    expect(record.renderData.lines).toEqual([
      { name: 'flour', qty: 8, unit: 'kg', unit_cost: '1.20', line_cost: '9.60' }
    ]);
  });

  it('uses the converted labor rate from pricing', () => {
    const record = assembleQuote(inputs, { ...priced, laborRate: 18.75 }, { now, validDays: 7, senderName: 'x' });
    expect(record.renderData.fields.labor_rate).toBe('18.75');
    expect(record.validUntil).toBe('2026-10-25');
  });

  it('draws ids from a shared allocator', () => {
    const ids = new QuoteIdAllocator();
    const first = assembleQuote(inputs, priced, { now, validDays: 14, senderName: 'x', ids });
    const second = assembleQuote(inputs, priced, { now, validDays: 14, senderName: 'x', ids });
    expect(first.quoteId).toBe('Q-20261018-100');
    expect(second.quoteId).toBe('Q-20261018-100-2');
    expect(second.renderData.fields.quote_id).toBe('Q-20261018-100-2');
  });
});
