export { createDb, type Db, type DbContext, type DbOptions, type Queryable } from "./db";
export { DEFAULT_MIGRATIONS_DIR, loadMigrations, type Migration, runMigrations } from "./migrate";
export {
  createExecutionRecordsRepo,
  type ExecutionRecordRow,
  rowToExecutionRecord,
} from "./repos/execution_records";
export { createResearchJobsRepo, type ResearchJobRow, rowToResearchJob } from "./repos/research_jobs";
