import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger, type Logger } from "@research-agent/shared";

import type { Db } from "./db";

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

/**
 * Read `NNN_name.sql` files from `dir`, ordered by version.
 */
export function loadMigrations(dir: string = DEFAULT_MIGRATIONS_DIR, log?: Logger): Migration[] {
  const migrations: Migration[] = [];
  for (const file of readdirSync(dir).filter((f) => f.endsWith(".sql"))) {
    const match = /^(\d+)_(.+)\.sql$/.exec(file);
    if (!match?.[1] || !match[2]) {
      log?.warn({ file }, "Skipping invalid migration filename");
      continue;
    }
    migrations.push({
      version: Number.parseInt(match[1], 10),
      name: match[2].replace(/_/g, " "),
      sql: readFileSync(join(dir, file), "utf-8").trim(),
    });
  }
  return migrations.sort((a, b) => a.version - b.version);
}

/**
 * Apply pending migrations, each in its own transaction. Returns the versions applied.
 */
export async function runMigrations(
  db: Pick<Db, "query" | "tx">,
  options: { dir?: string; log?: Logger } = {},
): Promise<number[]> {
  const log = options.log ?? createLogger({ component: "migrate" });
  await db.query(
    `create table if not exists schema_migrations (
       version integer primary key,
       name text not null,
       applied_at timestamptz not null default now()
     )`,
  );

  const res = await db.query<{ version: number | null }>("select max(version) as version from schema_migrations");
  const current = res.rows[0]?.version ?? 0;
  const pending = loadMigrations(options.dir, log).filter((m) => m.version > current);

  if (pending.length === 0) {
    log.info({ version: current }, "Database is up to date");
    return [];
  }

  log.info({ currentVersion: current, pending: pending.length }, "Running migrations");
  for (const migration of pending) {
    await db.tx(async (tx) => {
      await tx.query(migration.sql);
      await tx.query("insert into schema_migrations (version, name) values ($1, $2)", [
        migration.version,
        migration.name,
      ]);
    });
    log.info({ version: migration.version, name: migration.name }, "Applied migration");
  }
  return pending.map((m) => m.version);
}
