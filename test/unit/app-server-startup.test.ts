import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const APP_DEPENDENCY_MODULES = [
  "fastify",
  "@fastify/cors",
  "../../src/clients/lifecycle.js",
  "../../src/api/routes/health.js",
  "../../src/api/routes/infrastructure-health.js",
  "../../src/api/routes/index.js",
  "../../src/observability/metrics.js",
  "../../src/observability/request-tracing.js"
];

describe("app.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    for (const moduleId of APP_DEPENDENCY_MODULES) {
      vi.doUnmock(moduleId);
    }
  });

  it("buildAllowedFrontendOrigins returns defaults and localhost aliases", async () => {
    const { buildAllowedFrontendOrigins } = await import("../../src/app.js");

    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:5173", "http://127.0.0.1:5173"]);
    expect(buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
  });

  it("buildApp wires cors, hooks, lifecycle and routes with optional infra-health skip", async () => {
    const app = {
      register: vi.fn().mockResolvedValue(undefined)
    };
    const fastifyFactory = vi.fn(() => app);
    const corsPlugin = Symbol("cors");
    const registerClientLifecycle = vi.fn();
    const registerHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerInfrastructureHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerApiRoutes = vi.fn().mockResolvedValue(undefined);
    const registerMetricsRoutes = vi.fn().mockResolvedValue(undefined);
    const registerRequestMetricsHooks = vi.fn();
    const registerRequestTraceHooks = vi.fn();

    vi.doMock("fastify", () => ({ default: fastifyFactory }));
    vi.doMock("@fastify/cors", () => ({ default: corsPlugin }));
    vi.doMock("../../src/clients/lifecycle.js", () => ({ registerClientLifecycle }));
    vi.doMock("../../src/api/routes/health.js", () => ({ registerHealthRoute }));
    vi.doMock("../../src/api/routes/infrastructure-health.js", () => ({ registerInfrastructureHealthRoute }));
    vi.doMock("../../src/api/routes/index.js", () => ({ registerApiRoutes }));
    vi.doMock("../../src/observability/metrics.js", () => ({ registerMetricsRoutes, registerRequestMetricsHooks }));
    vi.doMock("../../src/observability/request-tracing.js", () => ({ registerRequestTraceHooks }));

    vi.stubEnv("FRONTEND_ORIGIN", "http://localhost:9999");
    const { buildApp } = await import("../../src/app.js");

    const apiDependencies = { qa: { getQaEngine: vi.fn() } };
    const built = await buildApp({ apiDependencies, registerInfrastructureHealth: false, logger: false });

    expect(built).toBe(app);
    expect(fastifyFactory).toHaveBeenCalledWith({ logger: false });
    expect(app.register).toHaveBeenCalledWith(corsPlugin, {
      origin: ["http://localhost:9999", "http://127.0.0.1:9999"],
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-Id"]
    });
    expect(registerRequestMetricsHooks).toHaveBeenCalledWith(app);
    expect(registerRequestTraceHooks).toHaveBeenCalledWith(app);
    expect(registerClientLifecycle).toHaveBeenCalledWith(app);
    expect(registerHealthRoute).toHaveBeenCalledWith(app);
    expect(registerMetricsRoutes).toHaveBeenCalledWith(app);
    expect(registerInfrastructureHealthRoute).not.toHaveBeenCalled();
    expect(registerApiRoutes).toHaveBeenCalledWith(app, apiDependencies);
  });

  it("serves health and metrics from the real app", async () => {
    const { buildApp } = await import("../../src/app.js");
    const app = await buildApp({ logger: false, registerInfrastructureHealth: false });
    try {
      const [health, metrics] = await Promise.all([
        app.inject({ method: "GET", url: "/health" }),
        app.inject({ method: "GET", url: "/metrics" })
      ]);

      expect(health.json()).toEqual({ status: "ok" });
      expect(metrics.statusCode).toBe(200);
    } finally {
      await app.close();
    }
  });
});

describe("startup-checks.ts", () => {
  it("skips loading the engine when disabled", async () => {
    const { runStartupChecks } = await import("../../src/startup/startup-checks.js");
    const loadEngine = vi.fn();

    await runStartupChecks({ enabled: false, loadEngine });

    expect(loadEngine).not.toHaveBeenCalled();
  });

  it("fails when the reference data cannot be loaded", async () => {
    const { runStartupChecks } = await import("../../src/startup/startup-checks.js");
    const loadEngine = vi.fn().mockRejectedValue(new Error("Invalid data in data/constitution.json"));

    await expect(runStartupChecks({ enabled: true, loadEngine })).rejects.toThrow("Invalid data in data/constitution.json");
  });

  it("loads the bundled reference files when enabled", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { runStartupChecks } = await import("../../src/startup/startup-checks.js");

    await expect(runStartupChecks({ enabled: true })).resolves.toBeUndefined();
  });
});

describe("clients/lifecycle.ts", () => {
  it("health checks on ready and shuts clients down on close", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { registerClientLifecycle } = await import("../../src/clients/lifecycle.js");
    const healthCheck = vi.fn().mockResolvedValue({ status: "ok" });
    const shutdownOpenAIClient = vi.fn().mockResolvedValue(undefined);
    const app = Fastify();

    registerClientLifecycle(app, {
      enableBootstrap: true,
      registerProcessSignals: false,
      loadClientModules: async () => ({
        getOpenAIClient: async () => ({ healthCheck }),
        shutdownOpenAIClient
      })
    });
    await app.ready();
    await app.close();

    expect(healthCheck).toHaveBeenCalledTimes(1);
    expect(shutdownOpenAIClient).toHaveBeenCalledTimes(1);
  });

  it("registers nothing when bootstrap is disabled", async () => {
    const { registerClientLifecycle } = await import("../../src/clients/lifecycle.js");
    const loadClientModules = vi.fn();
    const app = Fastify();

    registerClientLifecycle(app, { enableBootstrap: false, loadClientModules });
    await app.ready();
    await app.close();

    expect(loadClientModules).not.toHaveBeenCalled();
  });
});

describe("server.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("../../src/startup/startup-checks.js");
    vi.doUnmock("../../src/app.js");
  });

  it("resolvePort returns defaults for invalid inputs", async () => {
    vi.doMock("../../src/startup/startup-checks.js", () => ({ runStartupChecks: vi.fn() }));
    vi.doMock("../../src/app.js", () => ({ buildApp: vi.fn() }));
    const { resolvePort } = await import("../../src/server.js");

    expect(resolvePort(undefined)).toBe(3000);
    expect(resolvePort("")).toBe(3000);
    expect(resolvePort("0")).toBe(3000);
    expect(resolvePort("abc")).toBe(3000);
    expect(resolvePort("4321")).toBe(4321);
    expect(resolvePort(8080)).toBe(8080);
  });

  it("bootstrap runs startup checks and listens on the configured port", async () => {
    const runStartupChecks = vi.fn().mockResolvedValue(undefined);
    const listen = vi.fn().mockResolvedValue(undefined);
    const buildApp = vi.fn().mockResolvedValue({ listen });

    vi.doMock("../../src/startup/startup-checks.js", () => ({ runStartupChecks }));
    vi.doMock("../../src/app.js", () => ({ buildApp }));

    vi.stubEnv("PORT", "4567");
    const { bootstrap } = await import("../../src/server.js");
    await bootstrap();

    expect(runStartupChecks).toHaveBeenCalledTimes(1);
    expect(buildApp).toHaveBeenCalledTimes(1);
    expect(listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 4567 });
  });
});
