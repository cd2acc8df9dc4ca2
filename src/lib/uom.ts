import { UnsupportedConversionError } from './errors';

// factor applied to a quantity in `from` to express it in `to`
type Converter = (quantity: number) => number;

const CONVERSIONS = new Map<string, Map<string, Converter>>([
  ['g', new Map<string, Converter>([['kg', (quantity) => quantity * 0.001]])],
  ['kg', new Map<string, Converter>([['g', (quantity) => quantity * 1000]])],
  ['ml', new Map<string, Converter>([['L', (quantity) => quantity / 1000]])],
  ['L', new Map<string, Converter>([['ml', (quantity) => quantity * 1000]])]
]);

/**
 * Converts a quantity between units. Units are case-sensitive ("L", not "l").
 * Supported pairs: g<->kg and ml<->L; identical units pass through.
 */
export function convertQuantity(quantity: number, fromUnit: string, toUnit: string): number {
  if (fromUnit === toUnit) {
    return quantity;
  }
  const convert = CONVERSIONS.get(fromUnit)?.get(toUnit);
  if (!convert) {
    throw new UnsupportedConversionError(fromUnit, toUnit);
  }
  return convert(quantity);
}

/**
 * Cost of one BOM unit given a cost stored per `storedUnit`.
 * A material stored at 2.00/kg and consumed in g costs 0.002/g.
 */
export function unitCostForBom(storedUnitCost: number, bomUnit: string, storedUnit: string): number {
  const factor = convertQuantity(1, bomUnit, storedUnit);
  return storedUnitCost * factor;
}
