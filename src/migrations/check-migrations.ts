import { fileURLToPath } from "node:url";
import { withPostgresClient } from "../clients/postgres.js";
import { getSettings } from "../config/index.js";
import { logError, logInfo } from "../observability/logger.js";
import {
  defaultMigrationsDir,
  listMigrationFiles,
  SCHEMA_MIGRATIONS_DDL,
  type MigrationOptions
} from "./migration-files.js";

export class PendingMigrationsError extends Error {
  readonly pending: string[];

  constructor(pending: string[]) {
    super(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
    this.name = "PendingMigrationsError";
    this.pending = pending;
  }
}

export async function assertMigrationsCurrent(options: MigrationOptions): Promise<void> {
  const files = await listMigrationFiles(options.migrationsDir ?? defaultMigrationsDir);

  if (files.length === 0) {
    return;
  }

  await options.pool.query(SCHEMA_MIGRATIONS_DDL);

  const appliedResult = await options.pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map((row) => row.filename));

  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new PendingMigrationsError(pending);
  }
}

async function main(): Promise<void> {
  const { databaseUrl } = getSettings();
  await withPostgresClient(databaseUrl, (client) => assertMigrationsCurrent({ pool: client.pool }));
  logInfo("migrations.current", {});
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logError("migrations.check_failed", {}, { error: error instanceof Error ? error.message : "unknown error" });
    process.exitCode = 1;
  });
}
