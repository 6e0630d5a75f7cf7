import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from '../shared/schema';
import { pool } from './core/db';

export const db = drizzle(pool, { schema });

// Accepted by helpers that run either standalone or inside db.transaction()
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;
