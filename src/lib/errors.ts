export type QuoteErrorCode =
  | 'UNKNOWN_JOB_TYPE'
  | 'UNSUPPORTED_CONVERSION'
  | 'MISSING_MATERIALS'
  | 'MISSING_RATE'
  | 'MATERIAL_NOT_FOUND'
  | 'BOM_SERVICE_ERROR'
  | 'FX_CONFIG_INVALID';

/**
 * Base class for errors the quote pipeline raises on purpose.
 * `code` is stable and is what route error maps key on.
 */
export class QuoteError extends Error {
  constructor(
    public readonly code: QuoteErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'QuoteError';
  }
}

export class UnknownJobTypeError extends QuoteError {
  constructor(
    public readonly jobType: string,
    public readonly knownJobTypes: string[]
  ) {
    super('UNKNOWN_JOB_TYPE', `Unknown job_type "${jobType}" (expected one of: ${knownJobTypes.join(', ')})`);
    this.name = 'UnknownJobTypeError';
  }
}

export class UnsupportedConversionError extends QuoteError {
  constructor(
    public readonly fromUnit: string,
    public readonly toUnit: string
  ) {
    super('UNSUPPORTED_CONVERSION', `Cannot convert ${fromUnit} to ${toUnit}`);
    this.name = 'UnsupportedConversionError';
  }
}

export class MissingMaterialsError extends QuoteError {
  constructor(public readonly names: string[]) {
    super('MISSING_MATERIALS', `Missing materials in DB: ${names.join(', ')}`);
    this.name = 'MissingMaterialsError';
  }
}

export class MissingRateError extends QuoteError {
  constructor(
    public readonly fromCurrency: string,
    public readonly toCurrency: string
  ) {
    super('MISSING_RATE', `Missing FX rate for ${fromCurrency} or ${toCurrency}`);
    this.name = 'MissingRateError';
  }
}

export class MaterialNotFoundError extends QuoteError {
  constructor(public readonly materialName: string) {
    super('MATERIAL_NOT_FOUND', `Material not found: ${materialName}`);
    this.name = 'MaterialNotFoundError';
  }
}

export class BomServiceError extends QuoteError {
  constructor(
    message: string,
    public readonly status: number | null = null
  ) {
    super('BOM_SERVICE_ERROR', message);
    this.name = 'BomServiceError';
  }
}

export class FxConfigError extends QuoteError {
  constructor(message: string) {
    super('FX_CONFIG_INVALID', message);
    this.name = 'FxConfigError';
  }
}

export function isQuoteError(error: unknown): error is QuoteError {
  return error instanceof QuoteError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
