import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  SESSION_SECRET: z.string().optional(),
  WEATHER_API_URL: z.string().url().default('http://api.weatherstack.com/current'),
  WEATHER_API_KEY: z.string().optional(),
  WEATHER_DEFAULT_LOCATION: z.string().default('Miami, FL'),
  WEATHER_CACHE_TTL_MINUTES: z.coerce.number().positive().default(120),
  WIZARD_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  ADMIN_EMAILS: z.string().default(''),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  isProduction: boolean;
  port: number;
  databaseUrl?: string;
  dbPoolMax: number;
  sessionSecret?: string;
  weather: {
    apiUrl: string;
    apiKey?: string;
    defaultLocation: string;
    cacheTtlMs: number;
  };
  wizardTimeoutMs: number;
  adminEmails: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    isProduction: e.NODE_ENV === 'production',
    port: e.PORT,
    databaseUrl: e.DATABASE_URL || undefined,
    dbPoolMax: e.DB_POOL_MAX,
    sessionSecret: e.SESSION_SECRET || undefined,
    weather: {
      apiUrl: e.WEATHER_API_URL,
      apiKey: e.WEATHER_API_KEY || undefined,
      defaultLocation: e.WEATHER_DEFAULT_LOCATION,
      cacheTtlMs: e.WEATHER_CACHE_TTL_MINUTES * 60 * 1000,
    },
    wizardTimeoutMs: e.WIZARD_TIMEOUT_MINUTES * 60 * 1000,
    adminEmails: e.ADMIN_EMAILS
      .split(',')
      .map(email => email.trim().toLowerCase())
      .filter(email => email.length > 0),
  };
}

export const config = loadConfig();
