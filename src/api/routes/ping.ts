import type { FastifyInstance } from "fastify";
import type { Settings } from "../../config/index.js";

export interface PingResponse {
  ping: "pong!";
  environment: string;
  testing: boolean;
}

export async function registerPingRoute(app: FastifyInstance, settings: Settings): Promise<void> {
  app.get(
    "/ping",
    async (): Promise<PingResponse> => ({
      ping: "pong!",
      environment: settings.environment,
      testing: settings.testing
    })
  );
}
