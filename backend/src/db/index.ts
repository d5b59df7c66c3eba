// src/db/index.ts
import { Pool, QueryResultRow } from "pg";
import { AppConfig } from "../config";

export function createPool(pg: AppConfig["pg"]): Pool {
  return new Pool({ connectionString: pg.connectionString, ssl: pg.ssl });
}

export type Query = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<{ rows: T[] }>;

// simple helper
export function createQuery(pool: Pool): Query {
  return async <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
    const client = await pool.connect();
    try {
      return await client.query<T>(text, params);
    } finally {
      client.release();
    }
  };
}
