import fs from 'fs';
import { count, sql } from 'drizzle-orm';
import { z } from 'zod';
import { db, type DbExecutor } from './db';
import { queryWithRetry } from './core/db';
import { logger } from './core/logger';
import { register } from './core/userService';
import { services, products, users } from '../shared/schema';

const SCHEMA_FILE = new URL('./sql/schema.sql', import.meta.url);
const CATALOG_FILE = new URL('./data/catalog.json', import.meta.url);

export const DEMO_USER = {
  username: 'demo',
  email: 'demo@greenway.test',
  password: 'demo-password',
  fullName: 'Demo Customer',
};

const catalogSchema = z.object({
  services: z.array(z.object({
    name: z.string(),
    description: z.string().nullable().default(null),
    category: z.string(),
    priceCents: z.number().int().positive(),
    durationMinutes: z.number().int().positive(),
  })),
  products: z.array(z.object({
    name: z.string(),
    description: z.string().nullable().default(null),
    priceCents: z.number().int().positive(),
    size: z.string().nullable().default(null),
    category: z.string(),
    rating: z.string().nullable().default(null),
    reviewCount: z.number().int().nonnegative().default(0),
    features: z.array(z.string()).default([]),
  })),
});

export type CatalogSeed = z.infer<typeof catalogSchema>;

export function readSchemaSql(): string {
  return fs.readFileSync(SCHEMA_FILE, 'utf8');
}

export function readCatalogSeed(): CatalogSeed {
  return catalogSchema.parse(JSON.parse(fs.readFileSync(CATALOG_FILE, 'utf8')));
}

export async function ensureSchema(): Promise<void> {
  await queryWithRetry(readSchemaSql());
  logger.info('[DB Init] Schema ensured');
}

/** Inserts the reference catalog into empty tables; existing rows are left alone. */
export async function seedCatalog(executor: DbExecutor = db): Promise<{ services: number; products: number }> {
  const seed = readCatalogSeed();
  let insertedServices = 0;
  let insertedProducts = 0;

  const [serviceCount] = await executor.select({ value: count() }).from(services);
  if ((serviceCount?.value ?? 0) === 0) {
    const rows = await executor.insert(services).values(seed.services).returning({ id: services.id });
    insertedServices = rows.length;
  }

  const [productCount] = await executor.select({ value: count() }).from(products);
  if ((productCount?.value ?? 0) === 0) {
    const rows = await executor.insert(products).values(seed.products).returning({ id: products.id });
    insertedProducts = rows.length;
  }

  if (insertedServices > 0 || insertedProducts > 0) {
    logger.info('[DB Init] Catalog seeded', { extra: { services: insertedServices, products: insertedProducts } });
  }
  return { services: insertedServices, products: insertedProducts };
}

export async function seedDemoUser(): Promise<boolean> {
  const [existing] = await db
    .select({ id: users.id })
    .from(users)
    .where(sql`lower(${users.email}) = ${DEMO_USER.email}`)
    .limit(1);
  if (existing) return false;

  const result = await register(DEMO_USER);
  if (!result.success) {
    logger.warn('[DB Init] Demo user not created', { extra: { code: result.error.code, reason: result.error.message } });
    return false;
  }
  logger.info('[DB Init] Demo user created', { userId: result.data.id });
  return true;
}
