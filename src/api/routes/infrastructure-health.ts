import type { FastifyInstance } from "fastify";
import { describeError } from "../../errors/index.js";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const openaiModule = await import("../../clients/openai.js");
      const openai = await openaiModule.getOpenAIClient();
      const openaiHealth = await openai.healthCheck();

      if (openaiHealth.status !== "ok") {
        reply.code(503);
      }
      return {
        status: openaiHealth.status,
        clients: {
          openai: openaiHealth
        }
      };
    } catch (error) {
      reply.code(503);
      return {
        status: "error",
        detail: describeError(error)
      };
    }
  });
}
