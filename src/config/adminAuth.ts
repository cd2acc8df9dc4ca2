import { envInt } from './quoteDefaults';

export type AdminAuthSettings = {
  jwtSecret: string | null;
  passwordHash: string | null;
  tokenTtlSeconds: number;
};

export function getAdminAuthSettings(env: NodeJS.ProcessEnv = process.env): AdminAuthSettings {
  return {
    jwtSecret: env.JWT_SECRET?.trim() || null,
    passwordHash: env.ADMIN_PASSWORD_HASH?.trim() || null,
    tokenTtlSeconds: envInt(env, 'ADMIN_TOKEN_TTL_SECONDS', 8 * 60 * 60)
  };
}
