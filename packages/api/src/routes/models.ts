import {
  canLoadModel,
  findModel,
  type LoadedModelRef,
  recommendModels,
} from "@research-agent/conductor";
import { toDispatchError } from "@research-agent/llm";
import { errorMessage } from "@research-agent/shared";
import type { FastifyInstance } from "fastify";
import type { AppContext } from "../lib/context.js";
import { errorEnvelope, invalidParam, notFound } from "../lib/replies.js";
import { requiredText } from "../lib/validation.js";
import type { RouteOptions } from "./types.js";

const WARM_UP_PROMPT = "Hello";

/** Loaded models, or none when the inference service cannot say. */
export async function loadedModelsOrEmpty(
  ctx: AppContext,
  log: FastifyInstance["log"],
): Promise<LoadedModelRef[]> {
  try {
    return await ctx.inference.listLoaded();
  } catch (err) {
    log.warn({ err: errorMessage(err) }, "Failed to list loaded models");
    return [];
  }
}

export async function modelsRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  // GET /models - Catalog plus what the inference service has pulled and loaded
  fastify.get("/models", async () => {
    const [available, loaded] = await Promise.allSettled([
      ctx.inference.listModels(),
      ctx.inference.listLoaded(),
    ]);

    return {
      ok: true,
      catalog: ctx.catalog.models,
      defaultComplexModel: ctx.catalog.defaultComplexModel,
      available:
        available.status === "fulfilled"
          ? { models: available.value }
          : { models: [], error: errorMessage(available.reason) },
      loaded:
        loaded.status === "fulfilled"
          ? { models: loaded.value }
          : { models: [], error: errorMessage(loaded.reason) },
    };
  });

  // POST /models/recommend - Suggest models for a free-text task description
  fastify.post<{ Body: { taskDescription?: unknown } | undefined }>(
    "/models/recommend",
    async (request, reply) => {
      const description = requiredText("taskDescription", request.body?.taskDescription, 2000);
      if (!description.ok) return invalidParam(reply, description.message);

      const loaded = await loadedModelsOrEmpty(ctx, request.log);
      return {
        ok: true,
        ...recommendModels(ctx.catalog, description.value, {
          loaded,
          maxMemoryGb: ctx.maxModelMemoryGb,
        }),
      };
    },
  );

  // POST /models/:name/load - Warm a model up if it fits in the memory budget
  fastify.post<{ Params: { name: string } }>("/models/:name/load", async (request, reply) => {
    const { name } = request.params;
    const model = findModel(ctx.catalog, name);
    if (!model) return notFound(reply, `Model ${name} is not in the catalog`);

    const loaded = await loadedModelsOrEmpty(ctx, request.log);
    if (!canLoadModel(ctx.catalog, name, loaded, ctx.maxModelMemoryGb)) {
      return reply
        .code(409)
        .send(
          errorEnvelope(
            "INSUFFICIENT_MEMORY",
            `Loading ${name} would exceed the ${ctx.maxModelMemoryGb}GB model memory budget`,
          ),
        );
    }

    try {
      await ctx.inference.chat({ model: name, messages: [{ role: "user", content: WARM_UP_PROMPT }] });
    } catch (err) {
      const error = toDispatchError(err, name);
      request.log.warn({ model: name, reason: error.reason }, "Model warm-up failed");
      return reply.code(error.statusCode).send(errorEnvelope(error.code, error.message));
    }

    return { ok: true, model: name, status: "loaded", sizeGb: model.sizeGb };
  });
}
