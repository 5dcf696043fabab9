// Postgres/Drizzle client used by the runtime persistence layer.

import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { InfrastructureError } from "@/lib/errors";

let pool: Pool | null = null;

export function getPgPool(databaseUrl: string | undefined) {
  if (!databaseUrl) {
    throw new InfrastructureError("DATABASE_URL is not configured");
  }
  if (!pool) {
    pool = new Pool({ connectionString: databaseUrl });
  }
  return pool;
}

export function getDb(databaseUrl: string | undefined) {
  return drizzle(getPgPool(databaseUrl));
}

export async function closeDbPool() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
