import { Router, type Request, type Response } from 'express';
import type { AdminAuthSettings } from '../config/adminAuth';
import { mapPgErrorToHttp } from '../lib/pgErrors';
import { requireAdmin } from '../middleware/auth.middleware';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { logQuoteEvent, QUOTE_EVENT } from '../observability/quote.events';
import { materialCostUpdateSchema, materialNameParamSchema } from '../schemas/materials.schema';
import type { MaterialCostStore } from '../services/materials.service';

export function createMaterialsRouter(store: MaterialCostStore, authSettings: AdminAuthSettings) {
  const router = Router();

  router.get(
    '/materials',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const materials = await store.list();
      return res.json({ data: materials });
    })
  );

  router.get(
    '/materials/:name',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const name = materialNameParamSchema.safeParse(req.params.name);
      if (!name.success) {
        return res.status(400).json({ error: 'Invalid material name.' });
      }
      const material = await store.get(name.data);
      if (!material) {
        return res.status(404).json({ error: 'Material not found.' });
      }
      return res.json(material);
    })
  );

  router.put(
    '/materials/:name/cost',
    requireAdmin(authSettings),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const name = materialNameParamSchema.safeParse(req.params.name);
      if (!name.success) {
        return res.status(400).json({ error: 'Invalid material name.' });
      }
      const parsed = materialCostUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
      }

      try {
        const updated = await store.updateCost(name.data, parsed.data.unitCost);
        logQuoteEvent(QUOTE_EVENT.MATERIAL_COST_UPDATED, { name: updated.name, unitCost: updated.unitCost });
        return res.json(updated);
      } catch (error) {
        const mapped = mapPgErrorToHttp(error, {
          check: () => ({ status: 400, body: { error: 'Unit cost must not be negative.' } })
        });
        if (mapped) {
          return res.status(mapped.status).json(mapped.body);
        }
        throw error;
      }
    })
  );

  return router;
}
