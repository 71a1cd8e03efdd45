import { connectPostgres, withPostgresClient, type DatabaseConnector } from "../clients/postgres.js";
import type { Settings } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/check-migrations.js";

export interface StartupCheckDependencies {
  connect?: DatabaseConnector;
  assertMigrations?: typeof assertMigrationsCurrent;
}

export async function runStartupChecks(settings: Settings, dependencies: StartupCheckDependencies = {}): Promise<void> {
  if (!settings.runStartupChecks) {
    return;
  }

  const assertMigrations = dependencies.assertMigrations ?? assertMigrationsCurrent;
  await withPostgresClient(
    settings.databaseUrl,
    (client) => assertMigrations({ pool: client.pool }),
    dependencies.connect ?? connectPostgres
  );
}
