export {
  DEFAULT_RECIPES_PATH,
  getDefaultRecipeBook,
  listJobTypes,
  loadRecipeBook,
  roundBomQuantity,
  scaleBom,
  type RecipeBook
} from './internal/bomScaling';

export { convertCurrency, normalizeCurrencyCode } from './internal/currency';

export { aggregateCosts, findMissingMaterials, type AggregateOptions } from './internal/costAggregator';

export {
  addDays,
  assembleQuote,
  baseQuoteId,
  formatIsoDate,
  QuoteIdAllocator,
  type AssembleOptions
} from './internal/quoteAssembler';

export type * from './types';
