import { AppError } from "@research-agent/shared";
import cors from "@fastify/cors";
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import type { AppContext } from "./lib/context.js";
import { type ErrorEnvelope, errorEnvelope } from "./lib/replies.js";
import { registerMetricsHooks } from "./metrics.js";
import { analyticsRoutes } from "./routes/analytics.js";
import { chatRoutes } from "./routes/chat.js";
import { healthRoutes } from "./routes/health.js";
import { modelsRoutes } from "./routes/models.js";
import { researchRoutes } from "./routes/research.js";

export interface ServerOptions {
  /** Fastify request logging; off in tests */
  logger?: boolean;
}

function toEnvelope(error: FastifyError | AppError): { statusCode: number; envelope: ErrorEnvelope } {
  if (error instanceof AppError) {
    return { statusCode: error.statusCode, envelope: errorEnvelope(error.code, error.message) };
  }
  const statusCode = error.statusCode ?? 500;
  // Fastify's own 4xx errors (bad JSON, wrong content type) carry an FST_ code
  const code = statusCode < 500 ? "INVALID_REQUEST" : "INTERNAL_ERROR";
  return { statusCode, envelope: errorEnvelope(code, error.message) };
}

export async function buildServer(ctx: AppContext, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  // Enable CORS for local tools calling the API from the browser
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  });

  // Register Prometheus metrics hooks
  registerMetricsHooks(fastify);

  fastify.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    const { statusCode, envelope } = toEnvelope(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    return reply.code(statusCode).send(envelope);
  });

  await fastify.register(healthRoutes, { prefix: "/api", ctx });
  await fastify.register(chatRoutes, { prefix: "/api", ctx });
  await fastify.register(researchRoutes, { prefix: "/api", ctx });
  await fastify.register(modelsRoutes, { prefix: "/api", ctx });
  await fastify.register(analyticsRoutes, { prefix: "/api", ctx });

  return fastify;
}
