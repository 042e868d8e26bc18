import { summarizeAnalytics } from "@research-agent/conductor";
import type { FastifyInstance } from "fastify";
import { loadedModelsOrEmpty } from "./models.js";
import type { RouteOptions } from "./types.js";

export async function analyticsRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  // GET /analytics - Usage, memory and recommendations from recorded executions
  fastify.get("/analytics", async (request) => {
    const [records, loaded, researchJobs] = await Promise.all([
      ctx.analytics.list(),
      loadedModelsOrEmpty(ctx, request.log),
      ctx.research.counts(),
    ]);

    const summary = summarizeAnalytics({
      records,
      catalog: ctx.catalog,
      loadedModels: loaded,
      maxMemoryGb: ctx.maxModelMemoryGb,
    });

    return {
      ok: true,
      ...summary,
      systemInfo: {
        catalogModels: ctx.catalog.models.length,
        loadedModels: loaded.map((model) => model.name),
        researchJobs,
      },
    };
  });
}
