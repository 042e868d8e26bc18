export * from "./config/load_dotenv.js";
export * from "./config/runtime_env.js";
export * from "./errors.js";
export * from "./logging.js";
export * from "./metrics.js";
export * from "./types/execution.js";
export * from "./types/models.js";
export * from "./types/research.js";
