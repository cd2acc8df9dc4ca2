import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AdminAuthSettings } from '../config/adminAuth';
import { isAdminAuthConfigured, signAdminToken, verifyPassword } from '../lib/auth';
import { asyncErrorHandler } from '../middleware/validation/errors';

const loginSchema = z.object({
  password: z.string().min(1)
});

export function createAuthRouter(settings: AdminAuthSettings) {
  const router = Router();

  router.post(
    '/admin/login',
    asyncErrorHandler(async (req: Request, res: Response) => {
      if (!isAdminAuthConfigured(settings)) {
        return res.status(503).json({ error: 'Admin access is not configured.' });
      }
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
      }
      const valid = await verifyPassword(parsed.data.password, settings.passwordHash);
      if (!valid) {
        return res.status(401).json({ error: 'Invalid credentials.' });
      }
      return res.json({
        accessToken: signAdminToken(settings.jwtSecret, settings.tokenTtlSeconds),
        expiresInSeconds: settings.tokenTtlSeconds
      });
    })
  );

  return router;
}
