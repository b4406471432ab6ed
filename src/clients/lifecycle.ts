import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { logError, logInfo, serializeError } from "../observability/logger.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<unknown> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const openaiModule = await import("./openai.js");
  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient
  };
}

async function shutdownAllClients(source: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  logInfo("lifecycle.shutdown", {}, { source });
  await clients.shutdownOpenAIClient();
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP;
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    const openai = await clients.getOpenAIClient();
    await openai.healthCheck();
    logInfo("lifecycle.ready", {}, { clients: ["openai"] });
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("onClose", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = (signal: NodeJS.Signals): void => {
      logInfo("lifecycle.signal", {}, { signal });
      shutdownAllClients("process", loadClientModules)
        .catch((error: unknown) => {
          logError("lifecycle.shutdown.error", {}, serializeError(error));
        })
        .finally(() => {
          exit(0);
        });
    };

    process.once("SIGINT", () => handleSignal("SIGINT"));
    process.once("SIGTERM", () => handleSignal("SIGTERM"));
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
