import type { FastifyInstance } from "fastify";
import { getMetrics, getMetricsContentType } from "../metrics.js";
import type { RouteOptions } from "./types.js";

type ServiceStatus = "connected" | "disconnected";

export async function healthRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  fastify.get("/health", async () => {
    const inference: ServiceStatus = await ctx.inference.listModels().then(
      (): ServiceStatus => "connected",
      (err: unknown): ServiceStatus => {
        fastify.log.warn({ err }, "Inference service health check failed");
        return "disconnected";
      },
    );
    const services: Record<string, ServiceStatus> = { inference };
    if (ctx.queueHealth) {
      services.queue = (await ctx.queueHealth()) ? "connected" : "disconnected";
    }

    const healthy = Object.values(services).every((status) => status === "connected");
    return {
      ok: true,
      status: healthy ? "healthy" : "degraded",
      services,
      timestamp: new Date().toISOString(),
    };
  });

  fastify.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.type(getMetricsContentType()).send(metrics);
  });
}
