import { readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Pool } from "pg";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

export const SCHEMA_MIGRATIONS_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export interface MigrationOptions {
  pool: Pool;
  migrationsDir?: string;
}

export async function listMigrationFiles(migrationsDir: string): Promise<string[]> {
  return (await readdir(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();
}
