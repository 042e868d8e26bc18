import { createLogger, errorMessage } from "@research-agent/shared";
import { Pool } from "pg";
import type { PoolClient, QueryResult, QueryResultRow } from "pg";

import { createExecutionRecordsRepo } from "./repos/execution_records";
import { createResearchJobsRepo } from "./repos/research_jobs";

const log = createLogger({ component: "db" });

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export type DbContext = Queryable & {
  executionRecords: ReturnType<typeof createExecutionRecordsRepo>;
  researchJobs: ReturnType<typeof createResearchJobsRepo>;
};

export interface Db extends DbContext {
  tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface DbOptions {
  /** Per-model cap on stored execution records */
  maxRecordsPerModel?: number;
}

function createContext(db: Queryable, options: DbOptions): DbContext {
  return {
    query: db.query.bind(db),
    executionRecords: createExecutionRecordsRepo(db, { maxRecordsPerModel: options.maxRecordsPerModel }),
    researchJobs: createResearchJobsRepo(db),
  };
}

function asQueryable(client: PoolClient): Queryable {
  return {
    query: client.query.bind(client),
  };
}

export function createDb(databaseUrl: string, options: DbOptions = {}): Db {
  const pool = new Pool({ connectionString: databaseUrl });
  const base: Queryable = {
    query: pool.query.bind(pool),
  };

  const ctx = createContext(base, options);

  return {
    ...ctx,
    async tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const txCtx = createContext(asQueryable(client), options);
        const result = await fn(txCtx);
        await client.query("COMMIT");
        return result;
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackErr) {
          log.error({ err: errorMessage(rollbackErr) }, "Rollback failed");
        }
        throw err;
      } finally {
        client.release();
      }
    },
    async close(): Promise<void> {
      await pool.end();
    },
  };
}
