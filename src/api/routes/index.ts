import type { FastifyInstance } from "fastify";
import { registerQaRoutes, type QaRoutesDependencies } from "./qa.js";

export interface ApiRoutesDependencies {
  qa?: QaRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerQaRoutes(app, dependencies?.qa);
}
