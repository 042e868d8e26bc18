import { createLogger, errorMessage, loadDotEnvIfPresent, loadRuntimeEnv } from "@research-agent/shared";
import { createAppContext } from "./lib/context.js";
import { conductorMetricsHooks, recordResearchJob } from "./metrics.js";
import { buildServer } from "./server.js";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "api" });

async function main(): Promise<void> {
  const env = loadRuntimeEnv();
  const ctx = createAppContext(env, {
    hooks: conductorMetricsHooks,
    onStatusChange: recordResearchJob,
  });
  const server = await buildServer(ctx);

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, "Received signal, shutting down");
    await server.close();
    await ctx.close();
    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err: errorMessage(err) }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  await server.listen({ port: env.apiPort, host: "0.0.0.0" });
  log.info({ port: env.apiPort }, "API server listening");
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "Fatal error");
  process.exit(1);
});
