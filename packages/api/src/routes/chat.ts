import { randomUUID } from "node:crypto";
import type { FastifyInstance } from "fastify";
import { errorEnvelope, invalidParam } from "../lib/replies.js";
import { optionalCategory, optionalComplexity, requiredText } from "../lib/validation.js";
import type { RouteOptions } from "./types.js";

const MAX_MESSAGE_LENGTH = 32_000;

interface ChatBody {
  message?: unknown;
  complexity?: unknown;
  category?: unknown;
}

export async function chatRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  // POST /chat - Route a message to a model chosen by complexity and answer synchronously
  fastify.post<{ Body: ChatBody | undefined }>("/chat", async (request, reply) => {
    const body: ChatBody = request.body ?? {};

    const message = requiredText("message", body.message, MAX_MESSAGE_LENGTH);
    if (!message.ok) return invalidParam(reply, message.message);
    const complexity = optionalComplexity(body.complexity);
    if (!complexity.ok) return invalidParam(reply, complexity.message);
    const category = optionalCategory(body.category);
    if (!category.ok) return invalidParam(reply, category.message);

    const result = await ctx.conductor.route({
      id: randomUUID(),
      kind: "chat",
      content: message.value,
      complexity: complexity.value,
      ...(category.value ? { category: category.value } : {}),
    });

    if (!result.ok) {
      return reply.code(result.error.statusCode).send({
        ...errorEnvelope(result.error.code, result.error.message),
        modelUsed: result.decision.model.name,
      });
    }

    return {
      ok: true,
      response: result.text,
      modelUsed: result.decision.model.name,
      complexity: result.decision.complexity,
      reason: result.decision.reason,
      fallback: result.decision.fallback,
      responseTimeMs: result.record.latencyMs,
      timestamp: result.record.endedAt,
    };
  });
}
