import type { FastifyInstance } from "fastify";
import type { DatabaseClient, DatabaseConnector } from "./postgres.js";

export class DatabaseNotReadyError extends Error {
  constructor() {
    super("Database binding is not initialized. It is bound by the onReady hook.");
    this.name = "DatabaseNotReadyError";
  }
}

/** Holds the connected client between the app's onReady and onClose hooks. */
export class DatabaseBinding {
  private current: DatabaseClient | null = null;

  get isReady(): boolean {
    return this.current !== null;
  }

  get client(): DatabaseClient {
    if (!this.current) {
      throw new DatabaseNotReadyError();
    }
    return this.current;
  }

  bind(client: DatabaseClient): void {
    this.current = client;
  }

  async release(): Promise<void> {
    const client = this.current;
    this.current = null;
    if (client) {
      await client.close();
    }
  }
}

export interface DatabaseLifecycleOptions {
  databaseUrl: string;
  connect: DatabaseConnector;
}

export function registerDatabaseLifecycle(app: FastifyInstance, options: DatabaseLifecycleOptions): DatabaseBinding {
  const binding = new DatabaseBinding();

  app.addHook("onReady", async () => {
    binding.bind(await options.connect(options.databaseUrl));
    app.log.info("Database binding initialized");
  });

  app.addHook("onClose", async () => {
    app.log.info("Shutting down...");
    await binding.release();
  });

  return binding;
}
