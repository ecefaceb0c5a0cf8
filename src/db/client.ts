import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";

let pool: Pool | null = null;
let db: NodePgDatabase | null = null;

function requireDatabaseUrl(envName: string): string {
  const url = process.env[envName];
  if (!url) {
    throw new Error(`${envName} is not set in the environment.`);
  }
  return url;
}

export function getPool(envName = "DATABASE_URL"): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: requireDatabaseUrl(envName),
      // Hosted providers need TLS; their connection strings carry sslmode=require.
      ssl: process.env.DATABASE_SSL === "true" ? { rejectUnauthorized: false } : undefined
    });
  }
  return pool;
}

export function getDb(envName = "DATABASE_URL"): NodePgDatabase {
  if (!db) {
    db = drizzle(getPool(envName));
  }
  return db;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
