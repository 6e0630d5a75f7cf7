import { and, asc, eq, inArray } from 'drizzle-orm';
import { db, type DbExecutor } from '../db';
import { services, products, type Service, type Product } from '../../shared/schema';

export async function listActiveServices(executor: DbExecutor = db): Promise<Service[]> {
  return executor
    .select()
    .from(services)
    .where(eq(services.isActive, true))
    .orderBy(asc(services.id));
}

export async function getActiveService(serviceId: number, executor: DbExecutor = db): Promise<Service | null> {
  const [service] = await executor
    .select()
    .from(services)
    .where(and(eq(services.id, serviceId), eq(services.isActive, true)))
    .limit(1);
  return service ?? null;
}

export async function listActiveProducts(executor: DbExecutor = db): Promise<Product[]> {
  return executor
    .select()
    .from(products)
    .where(eq(products.isActive, true))
    .orderBy(asc(products.id));
}

export async function getActiveProductsByIds(ids: number[], executor: DbExecutor = db): Promise<Map<number, Product>> {
  if (ids.length === 0) return new Map();
  const rows = await executor
    .select()
    .from(products)
    .where(and(inArray(products.id, ids), eq(products.isActive, true)));
  return new Map(rows.map(row => [row.id, row]));
}
