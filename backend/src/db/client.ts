import pg from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import { env } from "../config/env";
import { ConnectivityError, errorMessage } from "../utils/errors";

export const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
  max: 10,
  idleTimeoutMillis: 30_000
});

pool.on("error", (err) => {
  console.error("[db] Idle client error:", err.message);
});

// Socket-level failures plus admin_shutdown / cannot_connect_now.
const CONNECTION_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "ECONNRESET", "57P01", "57P03"]);

export function isConnectionFailure(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    CONNECTION_CODES.has(error.code)
  );
}

export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<QueryResult<R>> {
  try {
    return await pool.query<R>(text, params);
  } catch (error) {
    if (isConnectionFailure(error)) {
      throw new ConnectivityError(`Postgres unreachable: ${errorMessage(error)}`, { cause: error });
    }
    throw error;
  }
}

export async function closePool() {
  await pool.end();
}
