import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import type { AdminAuthSettings } from '../config/adminAuth';

export type AdminTokenPayload = {
  sub: 'admin';
  role: 'admin';
};

export function hashPassword(password: string) {
  return bcrypt.hash(password, 12);
}

export function verifyPassword(password: string, passwordHash: string) {
  return bcrypt.compare(password, passwordHash);
}

export function isAdminAuthConfigured(settings: AdminAuthSettings): settings is AdminAuthSettings & {
  jwtSecret: string;
  passwordHash: string;
} {
  return settings.jwtSecret !== null && settings.passwordHash !== null;
}

export function signAdminToken(secret: string, ttlSeconds: number) {
  const payload: AdminTokenPayload = { sub: 'admin', role: 'admin' };
  return jwt.sign(payload, secret, { expiresIn: ttlSeconds });
}

export function verifyAdminToken(token: string, secret: string): AdminTokenPayload | null {
  const decoded = jwt.verify(token, secret);
  if (typeof decoded === 'string' || decoded.role !== 'admin') {
    return null;
  }
  return { sub: 'admin', role: 'admin' };
}
