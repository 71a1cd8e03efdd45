import { fileURLToPath } from "node:url";
import type { FastifyInstance } from "fastify";
import { buildApp } from "./app.js";
import { getSettings } from "./config/index.js";
import { logError, logInfo } from "./observability/logger.js";
import { runStartupChecks } from "./startup/startup-checks.js";

type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
}

export async function bootstrap(): Promise<FastifyInstance> {
  const settings = getSettings();
  await runStartupChecks(settings);

  const app = await buildApp({ settings });
  try {
    await app.listen({
      host: settings.host,
      port: settings.port
    });
  } catch (error) {
    await app.close();
    throw error;
  }
  return app;
}

export function registerShutdownSignals(
  app: FastifyInstance,
  signals: SignalSource = process,
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  const handleSignal = (signal: ShutdownSignal): void => {
    logInfo("shutdown.signal", {}, { signal });
    app.close().then(
      () => exit(0),
      (error: unknown) => {
        logError("shutdown.failed", {}, { error: error instanceof Error ? error.message : "unknown error" });
        exit(1);
      }
    );
  };

  signals.once("SIGINT", () => handleSignal("SIGINT"));
  signals.once("SIGTERM", () => handleSignal("SIGTERM"));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().then(
    (app) => registerShutdownSignals(app),
    (error: unknown) => {
      logError("startup.failed", {}, { error: error instanceof Error ? error.message : "unknown error" });
      process.exitCode = 1;
    }
  );
}
