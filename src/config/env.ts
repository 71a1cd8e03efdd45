import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export function resolveEnvironmentFiles(cwd: string, environment: string | undefined): string[] {
  const name = environment?.trim() || "dev";
  return [path.join(cwd, `.env.${name}`), path.join(cwd, ".env")];
}

export interface LoadEnvironmentFilesOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  fileExists?: (filePath: string) => boolean;
  readFile?: (filePath: string) => string;
}

/**
 * Copies entries from `.env.<ENVIRONMENT>` and then `.env` into the process
 * environment. Variables that are already set always win, so the shell beats
 * the environment-specific file and that file beats the shared one.
 *
 * @returns the files that were found and read
 */
export function loadEnvironmentFiles(options: LoadEnvironmentFilesOptions = {}): string[] {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const fileExists = options.fileExists ?? fs.existsSync;
  const readFile = options.readFile ?? ((filePath: string) => fs.readFileSync(filePath, "utf8"));
  const loaded: string[] = [];

  for (const filePath of resolveEnvironmentFiles(cwd, processEnv.ENVIRONMENT)) {
    if (!fileExists(filePath)) {
      continue;
    }

    for (const line of readFile(filePath).split(/\r?\n/)) {
      const entry = parseDotEnvLine(line);
      if (!entry) {
        continue;
      }
      const [key, value] = entry;
      if (processEnv[key] !== undefined) {
        continue;
      }
      processEnv[key] = value;
    }
    loaded.push(filePath);
  }

  return loaded;
}

const booleanFlagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number") {
      return value !== 0;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const originListSchema = z
  .string()
  .optional()
  .transform((value) =>
    Object.freeze(
      (value ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean)
    )
  );

export const settingsSchema = z.object({
  environment: z.string().trim().min(1).default("dev"),
  testing: booleanFlagSchema.default(false),
  databaseUrl: z
    .string({ required_error: "DATABASE_URL is required" })
    .trim()
    .min(1, "DATABASE_URL is required"),
  host: z.string().trim().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().positive().max(65535).default(8000),
  logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("info"),
  corsOrigins: originListSchema,
  runStartupChecks: booleanFlagSchema.default(false)
});

export type Settings = Readonly<z.output<typeof settingsSchema>>;
export type SettingsOverrides = Partial<z.input<typeof settingsSchema>>;

export const SETTINGS_ENV_KEYS = {
  environment: "ENVIRONMENT",
  testing: "TESTING",
  databaseUrl: "DATABASE_URL",
  host: "HOST",
  port: "PORT",
  logLevel: "LOG_LEVEL",
  corsOrigins: "CORS_ORIGINS",
  runStartupChecks: "RUN_STARTUP_CHECKS"
} as const satisfies Record<keyof Settings, string>;

type SettingsKey = keyof typeof SETTINGS_ENV_KEYS;

const isSettingsKey = (key: PropertyKey): key is SettingsKey =>
  typeof key === "string" && Object.hasOwn(SETTINGS_ENV_KEYS, key);

const SETTINGS_KEYS = Object.keys(SETTINGS_ENV_KEYS).filter(isSettingsKey);

export class InvalidSettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings:\n${issues.map((issue) => `- ${issue}`).join("\n")}`);
    this.name = "InvalidSettingsError";
    this.issues = issues;
  }
}

const formatIssue = (issue: z.ZodIssue): string => {
  const key = issue.path[0];
  const name = key !== undefined && isSettingsKey(key) ? SETTINGS_ENV_KEYS[key] : "settings";
  return `${name}: ${issue.message}`;
};

/** Blank values are treated as unset so that defaults apply. */
export function readSettingsFromEnv(rawEnv: NodeJS.ProcessEnv): Partial<Record<SettingsKey, string>> {
  const input: Partial<Record<SettingsKey, string>> = {};
  for (const key of SETTINGS_KEYS) {
    const value = rawEnv[SETTINGS_ENV_KEYS[key]]?.trim();
    if (value) {
      input[key] = value;
    }
  }
  return input;
}

export function createSettings(
  overrides: SettingsOverrides = {},
  rawEnv: NodeJS.ProcessEnv = process.env
): Settings {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = settingsSchema.safeParse({ ...readSettingsFromEnv(rawEnv), ...definedOverrides });

  if (!parsed.success) {
    throw new InvalidSettingsError(parsed.error.issues.map(formatIssue));
  }

  return Object.freeze({ ...parsed.data });
}
