import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const env = process.env.NODE_ENV;
const usePretty = env !== "production" && env !== "test";

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production and tests: JSON lines
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info"),
  transport: usePretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Logger for a single research job, correlated by job id.
 */
export function createJobLogger(jobId: string): pino.Logger {
  return createLogger({ component: "research", correlationId: jobId });
}

export type { Logger } from "pino";
