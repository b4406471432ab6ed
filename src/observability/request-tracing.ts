import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { logDebug, logInfo, logTrace } from "./logger.js";

type RequestTraceMode = "off" | "debug" | "trace";

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const parseBooleanFlag = (value: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
};

export const resolveRequestTraceMode = (rawEnv: NodeJS.ProcessEnv = process.env): RequestTraceMode => {
  const explicit = rawEnv.BACKEND_REQUEST_TRACE_MODE?.trim().toLowerCase();
  if (explicit === "off" || explicit === "debug" || explicit === "trace") {
    return explicit;
  }

  if (parseBooleanFlag(rawEnv.BACKEND_REQUEST_TRACE)) {
    return "debug";
  }

  return "off";
};

export const summarizeBody = (body: unknown): Record<string, unknown> | null => {
  if (body === undefined) {
    return null;
  }
  if (body === null) {
    return { type: "null" };
  }
  if (typeof body === "string") {
    return { type: "string", length: body.length };
  }
  if (Array.isArray(body)) {
    return { type: "array", length: body.length };
  }
  if (typeof body === "object") {
    const keys = Object.keys(body);
    return {
      type: "object",
      key_count: keys.length,
      keys: keys.slice(0, 20)
    };
  }
  return { type: typeof body };
};

const traceRequest = (
  mode: RequestTraceMode,
  request: FastifyRequest,
  reply: FastifyReply,
  event: string,
  fields: Record<string, unknown> = {}
): void => {
  const baseFields: Record<string, unknown> = {
    method: request.method,
    url: request.url,
    route: request.routeOptions.url ?? null,
    status_code: reply.statusCode || null,
    ...fields
  };

  if (mode === "trace") {
    logTrace(event, { requestId: request.id }, baseFields);
    return;
  }

  logDebug(event, { requestId: request.id }, baseFields);
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode: RequestTraceMode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  logInfo("http.trace.enabled", {}, { mode });

  app.addHook("onRequest", async (request, reply) => {
    requestStartTimes.set(request, Date.now());
    traceRequest(mode, request, reply, "http.request.start", {
      origin: request.headers.origin ?? null,
      "content-type": request.headers["content-type"] ?? null,
      "x-request-id": request.headers["x-request-id"] ?? null
    });
  });

  if (mode === "trace") {
    app.addHook("preHandler", async (request, reply) => {
      traceRequest(mode, request, reply, "http.request.pre_handler", {
        body: summarizeBody(request.body)
      });
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    traceRequest(mode, request, reply, "http.request.error", {
      error_name: error.name,
      error_message: error.message
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    traceRequest(mode, request, reply, "http.request.complete", {
      duration_ms: Date.now() - startedAt
    });
  });
};
