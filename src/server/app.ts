import Fastify, { type FastifyReply } from "fastify";
import { AssistantClient } from "../core/client/index.js";
import { loadConfig, type AppConfig } from "../core/config/index.js";
import { InputError, ServiceError } from "../core/errors.js";
import { buildReport } from "../core/report.js";
import { parseAnalysisRequest, parseTestCaseRequest } from "../core/requests/index.js";
import {
  AnalysisAreaSchema,
  ComplexityLevelSchema,
  DetailLevelSchema,
  SUPPORTED_MODELS,
  TestTypeSchema,
} from "../core/schemas/index.js";
import { createLLMProvider, type LLMProvider } from "../providers/index.js";

export interface ServerOptions {
  config?: AppConfig;
  /** Provider override, mainly for tests. */
  llm?: LLMProvider;
  logger?: boolean;
}

function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof InputError) {
    return reply.code(400).send({ error: error.message });
  }
  if (error instanceof ServiceError) {
    return reply.code(502).send({ error: error.message, reason: error.reason });
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return reply.code(500).send({ error: message });
}

export function buildServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  const llm =
    options.llm ??
    createLLMProvider({
      forceProvider: config.provider,
      apiKey: config.groqApiKey,
      model: config.defaultModel,
      baseURL: config.groqBaseUrl,
    });
  const client = new AssistantClient({ llm, chunkSize: config.chunkSize });

  // ── POST /test-cases ──────────────────────────────────────────────
  fastify.post("/test-cases", {
    schema: { body: { type: "object" } },
    handler: async (req, reply) => {
      try {
        const request = parseTestCaseRequest(req.body);
        const result = await client.generateTestCases(request.code, request);
        if (!result.ok) return sendError(reply, result.error);
        return reply.code(200).send(buildReport("TestCases", request.model, result.value));
      } catch (error) {
        return sendError(reply, error);
      }
    },
  });

  // ── POST /analysis ────────────────────────────────────────────────
  fastify.post("/analysis", {
    schema: { body: { type: "object" } },
    handler: async (req, reply) => {
      try {
        const request = parseAnalysisRequest(req.body);
        const result = await client.analyzeCode(request.code, request);
        if (!result.ok) return sendError(reply, result.error);
        return reply.code(200).send(buildReport("Analysis", request.model, result.value));
      } catch (error) {
        return sendError(reply, error);
      }
    },
  });

  // ── GET /options ──────────────────────────────────────────────────
  fastify.get("/options", async () => {
    return {
      models: SUPPORTED_MODELS,
      defaultModel: config.defaultModel,
      testTypes: TestTypeSchema.options,
      complexityLevels: ComplexityLevelSchema.options,
      analysisAreas: AnalysisAreaSchema.options,
      detailLevels: DetailLevelSchema.options,
    };
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return { status: "ok", provider: client.providerName, timestamp: new Date().toISOString() };
  });

  return fastify;
}
