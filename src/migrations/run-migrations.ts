import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { withPostgresClient, withTransaction } from "../clients/postgres.js";
import { getSettings } from "../config/index.js";
import { logDebug, logError, logInfo } from "../observability/logger.js";
import {
  defaultMigrationsDir,
  listMigrationFiles,
  SCHEMA_MIGRATIONS_DDL,
  type MigrationOptions
} from "./migration-files.js";

/**
 * Applies every `*.sql` file not yet recorded in `schema_migrations`, in
 * filename order. Each file runs in its own transaction together with its
 * bookkeeping row.
 *
 * @returns the filenames applied by this run
 */
export async function runMigrations(options: MigrationOptions): Promise<string[]> {
  const migrationsDir = options.migrationsDir ?? defaultMigrationsDir;
  const filenames = await listMigrationFiles(migrationsDir);

  if (filenames.length === 0) {
    return [];
  }

  await withTransaction(options.pool, async (client) => {
    await client.query(SCHEMA_MIGRATIONS_DDL);
  });

  const appliedResult = await options.pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  const alreadyApplied = new Set(appliedResult.rows.map((row) => row.filename));
  const applied: string[] = [];

  for (const filename of filenames) {
    if (alreadyApplied.has(filename)) {
      logDebug("migrations.skip", {}, { filename });
      continue;
    }

    const migrationSql = (await readFile(path.join(migrationsDir, filename), "utf8")).replace(/^\uFEFF/, "");

    await withTransaction(options.pool, async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    applied.push(filename);
  }

  return applied;
}

async function main(): Promise<void> {
  const { databaseUrl } = getSettings();
  const applied = await withPostgresClient(databaseUrl, (client) => runMigrations({ pool: client.pool }));
  logInfo("migrations.applied", {}, { filenames: applied });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logError("migrations.failed", {}, { error: error instanceof Error ? error.message : "unknown error" });
    process.exitCode = 1;
  });
}
