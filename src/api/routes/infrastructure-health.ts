import type { FastifyInstance } from "fastify";
import type { DatabaseBinding } from "../../clients/lifecycle.js";

export async function registerInfrastructureHealthRoute(app: FastifyInstance, database: DatabaseBinding): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const postgres = await database.client.healthCheck();
      if (postgres.status === "error") {
        reply.code(503);
      }

      return {
        status: postgres.status,
        clients: {
          postgres
        }
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
