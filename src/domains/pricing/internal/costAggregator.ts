import { MissingMaterialsError, MissingRateError } from '../../../lib/errors';
import { formatMoney } from '../../../lib/numbers';
import { unitCostForBom } from '../../../lib/uom';
import type { AggregateResult, BomEstimate, CostLine, FxRates, MaterialCost, QuoteInputs } from '../types';
import { convertCurrency, normalizeCurrencyCode } from './currency';

export type AggregateOptions = {
  /** currency the configured labor rate is expressed in */
  baseCurrency: string;
};

type ConversionOutcome = {
  amount: number;
  warning: string | null;
};

// A missing rate degrades to the unconverted amount plus a warning;
// any other failure propagates.
function convertOrWarn(
  amount: number,
  fromCurrency: string,
  toCurrency: string,
  rates: FxRates,
  describe: (reason: string) => string
): ConversionOutcome {
  try {
    return { amount: convertCurrency(amount, fromCurrency, toCurrency, rates), warning: null };
  } catch (error) {
    if (error instanceof MissingRateError) {
      return { amount, warning: describe(error.message) };
    }
    throw error;
  }
}

export function findMissingMaterials(bom: Pick<BomEstimate, 'materials'>, costs: ReadonlyMap<string, MaterialCost>): string[] {
  const missing: string[] = [];
  for (const material of bom.materials) {
    if (!costs.has(material.name) && !missing.includes(material.name)) {
      missing.push(material.name);
    }
  }
  return missing;
}

/**
 * Prices a scaled BOM. All-or-nothing: any material absent from `costs`
 * aborts before a single line is priced. Inputs are not modified; warnings and
 * the effective labor rate come back on the result.
 */
export function aggregateCosts(
  inputs: QuoteInputs,
  bom: Pick<BomEstimate, 'materials' | 'laborHours'>,
  costs: ReadonlyMap<string, MaterialCost>,
  rates: FxRates,
  options: AggregateOptions
): AggregateResult {
  const missing = findMissingMaterials(bom, costs);
  if (missing.length > 0) {
    throw new MissingMaterialsError(missing);
  }

  const quoteCurrency = normalizeCurrencyCode(inputs.currency);
  const baseCurrency = normalizeCurrencyCode(options.baseCurrency);
  const warnings: string[] = [];
  const lines: CostLine[] = [];
  let materialsSubtotal = 0;

  for (const material of bom.materials) {
    const cost = costs.get(material.name);
    if (!cost) {
      throw new MissingMaterialsError([material.name]);
    }
    const storedCurrency = normalizeCurrencyCode(cost.currency);
    let unitCost = cost.unitCost;
    if (storedCurrency !== quoteCurrency) {
      const outcome = convertOrWarn(
        unitCost,
        storedCurrency,
        quoteCurrency,
        rates,
        (reason) => `${material.name} priced in ${storedCurrency} but quote currency is ${quoteCurrency}: ${reason}`
      );
      unitCost = outcome.amount;
      if (outcome.warning) warnings.push(outcome.warning);
    }

    const perUnitCost = unitCostForBom(unitCost, material.unit, cost.unit);
    const lineCost = material.qty * perUnitCost;
    materialsSubtotal += lineCost;
    lines.push({
      name: material.name,
      qty: material.qty,
      unit: material.unit,
      unitCost: formatMoney(perUnitCost),
      lineCost: formatMoney(lineCost)
    });
  }

  let laborRate = inputs.laborRate;
  if (quoteCurrency !== baseCurrency) {
    const outcome = convertOrWarn(
      laborRate,
      baseCurrency,
      quoteCurrency,
      rates,
      (reason) => `Labor rate in ${baseCurrency} but quote currency is ${quoteCurrency}: ${reason}`
    );
    laborRate = outcome.amount;
    if (outcome.warning) warnings.push(outcome.warning);
  }

  const laborCost = bom.laborHours * laborRate;
  const subtotal = materialsSubtotal + laborCost;
  // priceBeforeVat = subtotal * (1 + markup) and total = priceBeforeVat * (1 + vat),
  // both taken from the unformatted figures.
  const markupValue = subtotal * inputs.markupPct;
  const priceBeforeVat = subtotal * (1 + inputs.markupPct);
  const vatValue = priceBeforeVat * inputs.vatPct;
  const total = priceBeforeVat * (1 + inputs.vatPct);
  const unitPrice = inputs.quantity > 0 ? total / inputs.quantity : 0;

  return {
    lines,
    warnings,
    laborRate,
    summary: {
      materialsSubtotal: formatMoney(materialsSubtotal),
      laborCost: formatMoney(laborCost),
      laborHours: bom.laborHours,
      subtotal: formatMoney(subtotal),
      markupValue: formatMoney(markupValue),
      priceBeforeVat: formatMoney(priceBeforeVat),
      vatValue: formatMoney(vatValue),
      total: formatMoney(total),
      unitPrice: formatMoney(unitPrice)
    }
  };
}
