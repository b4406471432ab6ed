import type { FastifyInstance } from "fastify";

export async function registerHealthRoute(app: FastifyInstance): Promise<void> {
  const handler = async () => ({ status: "ok" });
  app.get("/health", handler);
  app.get("/api/health", handler);
}
