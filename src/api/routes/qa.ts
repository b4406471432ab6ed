import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { DataFormatError, describeError, toSafeUserErrorMessage } from "../../errors/index.js";
import type { CitationChunk, GenerateStreamLine } from "../../modules/citations/types.js";
import { getDefaultQaEngine } from "../../modules/qa/default-engine.js";
import type { QaEngine } from "../../modules/qa/qa-engine.js";
import { parseReferenceStore, type ReferenceStore } from "../../modules/references/reference-store.js";
import { logError, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordStreamDuration } from "../../observability/metrics.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const SERVICE_UNAVAILABLE = "The question answering service is not available right now.";

const optionalEncodedFileSchema = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value : null));

// Session ids are opaque keys: checked for content, never rewritten.
const sessionIdSchema = z.string().refine((value) => value.trim().length > 0, "session_id is required");

const generateBodySchema = z.object({
  question: z.string().trim().min(1, "question is required"),
  session_id: sessionIdSchema,
  reality: optionalEncodedFileSchema,
  debugConstitution: optionalEncodedFileSchema
});

const restartBodySchema = z.object({
  session_id: sessionIdSchema
});

export type QaRouteEngine = Pick<QaEngine, "invokeStreaming" | "resetSession">;

export interface QaRoutesDependencies {
  getQaEngine?: () => Promise<QaRouteEngine>;
  now?: () => number;
}

const formatValidationError = (error: z.ZodError): string =>
  [
    "Invalid request body:",
    ...error.issues.map((issue) => `- ${issue.path.join(".") || "body"}: ${issue.message}`)
  ].join("\n");

const sendText = (reply: FastifyReply, statusCode: number, body: string): void => {
  reply.code(statusCode).type("text/plain; charset=utf-8").send(body);
};

export const decodeBase64Json = (value: string, source: string): string => {
  const compact = value.replace(/\s+/g, "");
  if (compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) {
    throw new DataFormatError(source, ["not valid base64"]);
  }
  return Buffer.from(compact, "base64").toString("utf8");
};

const decodeReferenceUpload = (value: string | null, source: string): ReferenceStore | null =>
  value === null ? null : parseReferenceStore(decodeBase64Json(value, source), source);

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

const buildStreamCorsHeaders = (request: FastifyRequest): Record<string, string> => {
  const origin = request.headers.origin;
  if (typeof origin !== "string" || origin.trim().length === 0) {
    return {};
  }

  return {
    "Access-Control-Allow-Origin": origin,
    Vary: "Origin"
  };
};

const writeLine = (reply: FastifyReply, line: GenerateStreamLine): void => {
  reply.raw.write(`${JSON.stringify(line)}\n`);
};

const buildGenerateHandler = (getQaEngine: () => Promise<QaRouteEngine>, now: () => number) =>
  async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const requestId = resolveRequestId(request);
    const parsed = generateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_400");
      sendText(reply, 400, formatValidationError(parsed.error));
      return;
    }
    const { question, session_id: sessionId } = parsed.data;
    const context = { requestId, sessionId };

    let reality: ReferenceStore | null;
    let constitution: ReferenceStore | null;
    try {
      reality = decodeReferenceUpload(parsed.data.reality, "reality upload");
      constitution = decodeReferenceUpload(parsed.data.debugConstitution, "debug constitution upload");
    } catch (error) {
      if (error instanceof DataFormatError) {
        recordErrorRate("validation_400");
        logWarn("generate.upload.invalid", context, { source: error.source, issues: error.issues });
        sendText(reply, 400, error.message);
        return;
      }
      throw error;
    }

    let engine: QaRouteEngine;
    try {
      engine = await getQaEngine();
    } catch (error) {
      recordErrorRate("generate_bootstrap_exception");
      logError("generate.bootstrap.error", context, serializeError(error));
      sendText(reply, 503, SERVICE_UNAVAILABLE);
      return;
    }

    const controller = new AbortController();
    let closedByClient = false;
    reply.raw.on("close", () => {
      if (!reply.raw.writableEnded) {
        closedByClient = true;
        controller.abort();
      }
    });

    const streamStartedAt = now();
    logInfo("generate.stream.start", context, {
      route: request.routeOptions.url ?? null,
      reality_supplied: reality !== null,
      constitution_override: constitution !== null
    });

    const chunks = engine.invokeStreaming(question, sessionId, reality?.list() ?? null, {
      constitution: constitution ?? undefined,
      signal: controller.signal,
      requestId
    });

    let next: IteratorResult<CitationChunk, void>;
    try {
      next = await chunks.next();
    } catch (error) {
      recordErrorRate("generate_stream_exception");
      logError("generate.stream.error", context, { error: describeError(error), lines_written: 0 });
      if (closedByClient) {
        reply.hijack();
        return;
      }
      sendText(reply, 503, toSafeUserErrorMessage(error));
      return;
    }

    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "application/x-ndjson; charset=utf-8",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
      ...buildStreamCorsHeaders(request)
    });

    let lineCount = 0;
    try {
      while (!next.done) {
        if (closedByClient) {
          logWarn("generate.stream.closed_by_client", context, { lines_written: lineCount });
          await chunks.return();
          break;
        }
        writeLine(reply, next.value);
        lineCount += 1;
        next = await chunks.next();
      }
    } catch (error) {
      if (!closedByClient) {
        recordErrorRate("generate_stream_exception");
        logError("generate.stream.error", context, { error: describeError(error), lines_written: lineCount });
        writeLine(reply, { type: "error", message: toSafeUserErrorMessage(error) });
      }
    } finally {
      const streamDurationMs = now() - streamStartedAt;
      recordStreamDuration(streamDurationMs);
      logInfo("generate.stream.complete", context, {
        stream_duration_ms: streamDurationMs,
        lines_written: lineCount,
        closed_by_client: closedByClient
      });
      if (!closedByClient) {
        reply.raw.end();
      }
    }
  };

const buildRestartHandler = (getQaEngine: () => Promise<QaRouteEngine>) =>
  async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const parsed = restartBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_400");
      sendText(reply, 400, formatValidationError(parsed.error));
      return;
    }

    const context = { requestId: resolveRequestId(request), sessionId: parsed.data.session_id };
    let engine: QaRouteEngine;
    try {
      engine = await getQaEngine();
    } catch (error) {
      logError("restart.bootstrap.error", context, serializeError(error));
      sendText(reply, 503, SERVICE_UNAVAILABLE);
      return;
    }

    engine.resetSession(parsed.data.session_id);
    logInfo("session.restart", context);
    reply.send({ status: "ok" });
  };

const handleRouteError = (error: FastifyError, request: FastifyRequest, reply: FastifyReply): void => {
  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    recordErrorRate("validation_400");
    sendText(reply, statusCode, `Invalid request body:\n- body: ${error.message}`);
    return;
  }

  recordErrorRate("qa_route_exception");
  logError("qa.route.error", { requestId: resolveRequestId(request) }, serializeError(error));
  sendText(reply, 500, toSafeUserErrorMessage(error));
};

export async function registerQaRoutes(app: FastifyInstance, dependencies?: QaRoutesDependencies): Promise<void> {
  const getQaEngine = dependencies?.getQaEngine ?? getDefaultQaEngine;
  const now = dependencies?.now ?? Date.now;
  await app.register(async (scope) => {
    scope.setErrorHandler(handleRouteError);
    scope.post("/api/generate", buildGenerateHandler(getQaEngine, now));
    scope.post("/api/restart", buildRestartHandler(getQaEngine));
  });
}
