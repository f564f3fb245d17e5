import { Pool } from "pg";
import type { AppConfig } from "../config/appConfig";

let pool: Pool | null = null;

/**
 * Shared pool, or null when no DATABASE_URL is configured. Persistence of
 * cost records is optional; generation works without a database.
 */
export function getPool(config: AppConfig): Pool | null {
  if (!config.databaseUrl) return null;
  if (!pool) {
    pool = new Pool({ connectionString: config.databaseUrl });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const p = pool;
    pool = null;
    await p.end();
  }
}
