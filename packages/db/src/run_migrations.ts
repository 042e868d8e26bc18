import { createLogger, errorMessage, loadDotEnvIfPresent, requireEnv } from "@research-agent/shared";

import { createDb } from "./db";
import { runMigrations } from "./migrate";

const log = createLogger({ component: "migrate" });

async function main(): Promise<void> {
  loadDotEnvIfPresent();
  const db = createDb(requireEnv("DATABASE_URL", process.env.DATABASE_URL));
  try {
    const applied = await runMigrations(db, { log });
    log.info({ applied }, "Migrations finished");
  } finally {
    await db.close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "Migration failed");
  process.exit(1);
});
