import type { Request, Response, NextFunction } from 'express';
import {
  BomServiceError,
  isQuoteError,
  MissingMaterialsError,
  UnknownJobTypeError,
  type QuoteError,
  type QuoteErrorCode
} from '../../lib/errors';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

export type ErrorHandlerMap = Partial<Record<QuoteErrorCode, (error: QuoteError) => ErrorResponse>>;

/**
 * Wraps an async route handler; known quote errors are mapped through
 * `errorMap`, anything else becomes a logged 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap: ErrorHandlerMap = quoteErrorMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      if (isQuoteError(error)) {
        const mapper = errorMap[error.code];
        if (mapper) {
          const mapped = mapper(error);
          return res.status(mapped.status).json(mapped.body);
        }
      }

      console.error(error);
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

export function createErrorResponse(status: number, message: string, details?: Record<string, unknown>): ErrorResponse {
  return { status, body: { error: message, ...(details && { details }) } };
}

export const quoteErrorMap: ErrorHandlerMap = {
  UNKNOWN_JOB_TYPE: (error) =>
    createErrorResponse(400, error.message, {
      knownJobTypes: error instanceof UnknownJobTypeError ? error.knownJobTypes : []
    }),
  UNSUPPORTED_CONVERSION: (error) => createErrorResponse(400, error.message),
  MISSING_MATERIALS: (error) =>
    createErrorResponse(422, error.message, {
      missing: error instanceof MissingMaterialsError ? error.names : [],
      action: 'Please add missing materials and retry.'
    }),
  MATERIAL_NOT_FOUND: () => createErrorResponse(404, 'Material not found.'),
  BOM_SERVICE_ERROR: (error) =>
    createErrorResponse(502, error.message, {
      upstreamStatus: error instanceof BomServiceError ? error.status : null
    }),
  FX_CONFIG_INVALID: (error) => createErrorResponse(500, error.message)
};
