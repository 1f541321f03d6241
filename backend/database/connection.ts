import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from "pg";
import { z } from "zod";

// =========================================================================
// Cycle Insight Database Access
//
// One lazily created pool. Two ways in:
//   query()               single statement, autocommit
//   withUserTransaction() BEGIN + per-user advisory lock ... COMMIT/ROLLBACK
//
// Every write that checks existing rows before inserting (cycle appends,
// screening results, diagnosis transitions) goes through the second, so two
// writers for the same user never interleave across processes.
// =========================================================================

const SLOW_QUERY_MS = 1000;

// Minimal surface handed to transaction callbacks.
export interface SqlClient {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_IDLE_TIMEOUT: z.coerce.number().int().nonnegative().default(30_000),
  DB_CONNECT_TIMEOUT: z.coerce.number().int().nonnegative().default(5_000),
  DB_SSL: z.enum(["true", "false"]).default("true"),
  DB_SSL_REJECT_UNAUTHORIZED: z.enum(["true", "false"]).default("true"),
});

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const parsed = DatabaseEnvSchema.safeParse({
    DATABASE_URL: env.DATABASE_URL,
    DB_POOL_MAX: env.DB_POOL_MAX || undefined,
    DB_IDLE_TIMEOUT: env.DB_IDLE_TIMEOUT || undefined,
    DB_CONNECT_TIMEOUT: env.DB_CONNECT_TIMEOUT || undefined,
    DB_SSL: env.DB_SSL || undefined,
    DB_SSL_REJECT_UNAUTHORIZED: env.DB_SSL_REJECT_UNAUTHORIZED || undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid database setting ${issue.path.join(".")}: ${issue.message}`);
  }

  const e = parsed.data;
  return {
    connectionString: e.DATABASE_URL,
    max: e.DB_POOL_MAX,
    idleTimeoutMillis: e.DB_IDLE_TIMEOUT,
    connectionTimeoutMillis: e.DB_CONNECT_TIMEOUT,
    ssl: e.DB_SSL === "false" ? false : { rejectUnauthorized: e.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
  };
}

let pool: Pool | undefined;

function getPool(): Pool {
  if (!pool) {
    pool = new Pool(loadDatabaseConfig());
    pool.on("error", (err: Error) => {
      console.error("[CycleInsight DB] Idle client error:", err.message);
    });
    console.log("[CycleInsight DB] Pool ready");
  }
  return pool;
}

async function timed<T extends QueryResultRow>(text: string, run: () => Promise<QueryResult<T>>): Promise<QueryResult<T>> {
  const start = Date.now();
  const result = await run();
  const elapsed = Date.now() - start;
  if (elapsed > SLOW_QUERY_MS) {
    console.warn(`[CycleInsight DB] Slow query (${elapsed}ms): ${text.replace(/\s+/g, " ").slice(0, 100)}`);
  }
  return result;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const p = getPool();
  return timed(text, () => p.query<T>(text, params));
}

function sqlClient(client: PoolClient): SqlClient {
  return {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
      return timed(text, () => client.query<T>(text, params));
    },
  };
}

/**
 * Runs `fn` in a transaction holding `pg_advisory_xact_lock(hashtext(userId))`.
 * Any rejection rolls back every statement `fn` issued. A failed ROLLBACK is
 * logged; the original error is the one rethrown.
 */
export async function withUserTransaction<T>(userId: string, fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [userId]);
    const result = await fn(sqlClient(client));
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      const message = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
      console.error("[CycleInsight DB] ROLLBACK failed:", message);
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = undefined;
    await closing.end();
    console.log("[CycleInsight DB] Pool closed");
  }
}
