import { configureLogLevel, logInfo } from "../observability/logger.js";
import { createSettings, loadEnvironmentFiles, type Settings } from "./env.js";

export type { Settings, SettingsOverrides } from "./env.js";
export { createSettings, InvalidSettingsError } from "./env.js";

let cachedSettings: Settings | null = null;

/**
 * Resolves settings from the environment on first use and hands back the same
 * frozen instance afterwards. Only the process entry points call this; the app
 * itself receives its settings through `buildApp`.
 */
export function getSettings(): Settings {
  if (cachedSettings) {
    return cachedSettings;
  }

  const envFiles = loadEnvironmentFiles();
  const settings = createSettings();
  configureLogLevel(settings.logLevel);
  logInfo("settings.load", {}, { env_files: envFiles });
  cachedSettings = settings;
  return cachedSettings;
}

export function resetSettingsForTests(): void {
  cachedSettings = null;
}
