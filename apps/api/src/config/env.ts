import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  DATABASE_URL: z.string().min(1).optional(),
  PG_POOL_MAX: z.coerce.number().int().min(1).max(200).default(20),
  CORS_ORIGIN: z.string().default('*'),
  /** Requests without x-user-id act as a system admin. Local development only. */
  AUTH_DEV_FALLBACK: booleanFlag,
  DEFAULT_KM_ALLOWANCE: z.coerce.number().int().min(0).default(300),
  BUSINESS_TIMEZONE: z.string().optional(),
  COMPANY_NAME: z.string().default('RentDesk Vehicle Rental'),
});

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  poolMax: number;
  corsOrigin: string;
  authDevFallback: boolean;
  defaultKmAllowance: number;
  businessTimezone: string | undefined;
  companyName: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    poolMax: parsed.PG_POOL_MAX,
    corsOrigin: parsed.CORS_ORIGIN,
    authDevFallback: parsed.AUTH_DEV_FALLBACK,
    defaultKmAllowance: parsed.DEFAULT_KM_ALLOWANCE,
    businessTimezone: parsed.BUSINESS_TIMEZONE,
    companyName: parsed.COMPANY_NAME,
  };
}
