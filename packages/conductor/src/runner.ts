import { createLogger, errorMessage, type Logger } from "@research-agent/shared";

/**
 * Accepts research job ids for background execution.
 * `schedule` resolves once the job is accepted, not when it finishes.
 */
export interface JobRunner {
  schedule(jobId: string): Promise<void>;
}

export interface InProcessJobRunner extends JobRunner {
  /** Jobs waiting plus jobs running */
  size(): number;
  /** Resolves when nothing is waiting or running */
  idle(): Promise<void>;
}

/**
 * Bounded FIFO pool running `execute` in this process.
 */
export function createInProcessJobRunner(
  execute: (jobId: string) => Promise<unknown>,
  options: { concurrency?: number; log?: Logger } = {},
): InProcessJobRunner {
  const concurrency = Math.max(1, options.concurrency ?? 2);
  const log = options.log ?? createLogger({ component: "job-runner" });
  const waiting: string[] = [];
  let active = 0;
  let idleWaiters: Array<() => void> = [];

  function settleIdle(): void {
    if (active > 0 || waiting.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function pump(): void {
    while (active < concurrency && waiting.length > 0) {
      const jobId = waiting.shift();
      if (jobId === undefined) break;
      active += 1;
      void execute(jobId)
        .catch((err: unknown) => {
          log.error({ jobId, err: errorMessage(err) }, "Research job crashed");
        })
        .finally(() => {
          active -= 1;
          pump();
          settleIdle();
        });
    }
  }

  return {
    async schedule(jobId: string): Promise<void> {
      waiting.push(jobId);
      // start on the next tick so schedule() returns before any work begins
      setImmediate(pump);
    },
    size: () => waiting.length + active,
    idle(): Promise<void> {
      if (active === 0 && waiting.length === 0) return Promise.resolve();
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },
  };
}
