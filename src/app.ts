import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerPingRoute } from "./api/routes/ping.js";
import { registerDatabaseLifecycle } from "./clients/lifecycle.js";
import { connectPostgres, type DatabaseConnector } from "./clients/postgres.js";
import type { Settings } from "./config/index.js";

export interface BuildAppOptions {
  settings: Settings;
  connectDatabase?: DatabaseConnector;
  registerInfrastructureHealth?: boolean;
}

/** Adds the 127.0.0.1 twin of every localhost origin, and the reverse. */
export function expandLoopbackOrigins(configured: readonly string[]): string[] {
  const origins = new Set<string>(configured);

  for (const origin of [...origins]) {
    let url: URL;
    try {
      url = new URL(origin);
    } catch {
      continue;
    }
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { settings } = options;
  const app = Fastify({ logger: { level: settings.logLevel } });

  if (settings.corsOrigins.length > 0) {
    await app.register(cors, {
      origin: expandLoopbackOrigins(settings.corsOrigins),
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-Id"]
    });
  }

  const database = registerDatabaseLifecycle(app, {
    databaseUrl: settings.databaseUrl,
    connect: options.connectDatabase ?? connectPostgres
  });

  await registerPingRoute(app, settings);
  if (options.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app, database);
  }

  return app;
}
