export type JobType = string;

export type BomLine = {
  name: string;
  unit: string;
  qty: number;
};

export type BomEstimate = {
  jobType: JobType;
  quantity: number;
  materials: BomLine[];
  laborHours: number;
};

export type MaterialCost = {
  name: string;
  unit: string;
  unitCost: number;
  currency: string;
};

/** Currency code -> rate against one shared base. Empty means FX is disabled. */
export type FxRates = Record<string, number>;

export type QuoteInputs = {
  jobType: JobType;
  quantity: number;
  dueDate: string;
  companyName: string;
  customerName: string;
  customerEmail: string;
  currency: string;
  laborRate: number;
  /** fraction, 0.3 = 30% */
  markupPct: number;
  /** fraction, 0.2 = 20% */
  vatPct: number;
  notes: string;
};

export type CostLine = {
  name: string;
  qty: number;
  unit: string;
  unitCost: string;
  lineCost: string;
};

export type QuoteSummary = {
  materialsSubtotal: string;
  laborCost: string;
  laborHours: number;
  subtotal: string;
  markupValue: string;
  priceBeforeVat: string;
  vatValue: string;
  total: string;
  unitPrice: string;
};

export type AggregateResult = {
  lines: CostLine[];
  summary: QuoteSummary;
  warnings: string[];
  /** labor rate actually charged, in the quote currency when a rate was available */
  laborRate: number;
};

export type RenderValue = string | number;

export type RenderLine = Record<string, RenderValue>;

/**
 * Flat template context: `fields` feed `{{name}}` placeholders and each entry
 * of `lines` is merged over `fields` for one pass of the `{{#lines}}` block.
 */
export type RenderData = {
  fields: Record<string, RenderValue>;
  lines: RenderLine[];
};

export type QuoteRecord = {
  quoteId: string;
  quoteDate: string;
  validUntil: string;
  renderData: RenderData;
};
