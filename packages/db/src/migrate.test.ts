import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "@research-agent/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Db } from "./db";
import { loadMigrations, runMigrations } from "./migrate";

const silentLog = { info: vi.fn(), warn: vi.fn() } as unknown as Logger;

describe("migrations", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "migrations-"));
    writeFileSync(join(dir, "002_add_index.sql"), "create index b on t (b);\n");
    writeFileSync(join(dir, "001_create_table.sql"), "create table t (b int);\n");
    writeFileSync(join(dir, "notes.txt"), "not a migration");
    writeFileSync(join(dir, "draft.sql"), "select 1;");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads numbered files in version order", () => {
    expect(loadMigrations(dir, silentLog)).toEqual([
      { version: 1, name: "create table", sql: "create table t (b int);" },
      { version: 2, name: "add index", sql: "create index b on t (b);" },
    ]);
  });

  it("ships the schema migrations", () => {
    expect(loadMigrations().map((m) => [m.version, m.name])).toEqual([
      [1, "research jobs"],
      [2, "execution records"],
    ]);
  });

  it("applies only versions newer than the recorded one", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ version: 1 }] });
    const txQuery = vi.fn().mockResolvedValue({ rows: [] });
    const tx = vi.fn(async (fn: (ctx: unknown) => Promise<unknown>) => fn({ query: txQuery }));
    const db = { query, tx } as unknown as Pick<Db, "query" | "tx">;

    const applied = await runMigrations(db, { dir, log: silentLog });

    expect(applied).toEqual([2]);
    expect(tx).toHaveBeenCalledTimes(1);
    expect(txQuery.mock.calls).toEqual([
      ["create index b on t (b);"],
      ["insert into schema_migrations (version, name) values ($1, $2)", [2, "add index"]],
    ]);
  });

  it("does nothing when up to date", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ version: 2 }] });
    const tx = vi.fn();
    const db = { query, tx } as unknown as Pick<Db, "query" | "tx">;

    expect(await runMigrations(db, { dir, log: silentLog })).toEqual([]);
    expect(tx).not.toHaveBeenCalled();
  });
});
