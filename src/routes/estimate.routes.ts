import { Router, type Request, type Response } from 'express';
import { listJobTypes, scaleBom, type RecipeBook } from '../domains/pricing';
import { estimateRequestSchema } from '../schemas/quotes.schema';
import { asyncErrorHandler, createErrorResponse } from '../middleware/validation/errors';

/**
 * The BOM estimate API: recipes scaled to a requested quantity.
 * Wire format is snake_case.
 */
export function createEstimateRouter(book: RecipeBook) {
  const router = Router();

  router.get('/healthz', (_req: Request, res: Response) => {
    return res.json({ status: 'ok' });
  });

  router.get('/job-types', (_req: Request, res: Response) => {
    return res.json(listJobTypes(book));
  });

  router.post(
    '/estimate',
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = estimateRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
        }
        const estimate = scaleBom(book, parsed.data.job_type, parsed.data.quantity);
        return res.json({
          job_type: estimate.jobType,
          quantity: estimate.quantity,
          materials: estimate.materials,
          labor_hours: estimate.laborHours
        });
      },
      {
        UNKNOWN_JOB_TYPE: () => createErrorResponse(400, 'Unknown job_type')
      }
    )
  );

  return router;
}
