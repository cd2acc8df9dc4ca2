import type { Request, Response, NextFunction } from 'express';
import type { AdminAuthSettings } from '../config/adminAuth';
import { isAdminAuthConfigured, verifyAdminToken } from '../lib/auth';
import { updateRequestContext } from '../lib/requestContext';

function extractBearerToken(header?: string) {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer') return null;
  return token ?? null;
}

export function requireAdmin(settings: AdminAuthSettings) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!isAdminAuthConfigured(settings)) {
      return res.status(503).json({ error: 'Admin access is not configured.' });
    }

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      return res.status(401).json({ error: 'Missing access token.' });
    }

    try {
      const payload = verifyAdminToken(token, settings.jwtSecret);
      if (!payload) {
        return res.status(403).json({ error: 'Admin role required.' });
      }
      req.isAdmin = true;
      updateRequestContext({ isAdmin: true });
      return next();
    } catch {
      return res.status(401).json({ error: 'Invalid or expired access token.' });
    }
  };
}
