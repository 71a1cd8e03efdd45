import { Pool, type PoolClient, type PoolConfig } from "pg";
import { logInfo, logWarn } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export interface DatabaseHealth {
  status: HealthStatus;
  details?: string;
}

export interface DatabaseClient {
  pool: Pool;
  healthCheck: () => Promise<DatabaseHealth>;
  close: () => Promise<void>;
}

export type DatabaseConnector = (databaseUrl: string) => Promise<DatabaseClient>;

export interface ConnectPostgresOptions {
  retries?: number;
  retryDelayMs?: number;
  createPool?: (config: PoolConfig) => Pool;
  delay?: (ms: number) => Promise<void>;
}

// The database container usually comes up after the API, so the first
// connection is retried before startup is declared failed.
const STARTUP_RETRIES = 10;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function getDatabaseName(connectionString: string): string | null {
  try {
    const name = new URL(connectionString).pathname.replace(/^\/+/, "").trim();
    return name.length > 0 ? name : null;
  } catch {
    return null;
  }
}

async function withRetries<T>(
  operation: () => Promise<T>,
  retries: number,
  retryDelayMs: number,
  wait: (ms: number) => Promise<void>
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= retries; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < retries) {
        logWarn("db.connect.retry", {}, {
          attempt,
          error: error instanceof Error ? error.message : "unknown error"
        });
        await wait(retryDelayMs * attempt);
      }
    }
  }

  throw lastError;
}

export async function connectPostgres(
  databaseUrl: string,
  options: ConnectPostgresOptions = {}
): Promise<DatabaseClient> {
  const createPool = options.createPool ?? ((config: PoolConfig) => new Pool(config));
  const pool = createPool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  try {
    await withRetries(
      async () => {
        await pool.query("SELECT 1");
      },
      options.retries ?? STARTUP_RETRIES,
      options.retryDelayMs ?? STARTUP_RETRY_DELAY_MS,
      options.delay ?? delay
    );
  } catch (error) {
    await pool.end();
    throw error;
  }

  logInfo("db.connected", {}, { database: getDatabaseName(databaseUrl) });

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    },
    async close() {
      await pool.end();
      logInfo("db.closed", {}, { database: getDatabaseName(databaseUrl) });
    }
  };
}

export async function withPostgresClient<T>(
  databaseUrl: string,
  operation: (client: DatabaseClient) => Promise<T>,
  connect: DatabaseConnector = connectPostgres
): Promise<T> {
  const client = await connect(databaseUrl);
  try {
    return await operation(client);
  } finally {
    await client.close();
  }
}

export async function withTransaction<T>(pool: Pool, operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
