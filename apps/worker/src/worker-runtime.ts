import { createComponentLogger, errorMessage, type ComponentLogger } from "@cid-ledger/ledger-core";

export type WorkerJobContext = {
  signal: AbortSignal;
};

export type WorkerJob = {
  name: string;
  intervalMs: number;
  run: (context: WorkerJobContext) => Promise<unknown>;
};

export type CreateWorkerRuntimeOptions = {
  tickIntervalMs: number;
  shutdownTimeoutMs: number;
  jobs: WorkerJob[];
  setIntervalFn?: typeof setInterval;
  clearIntervalFn?: typeof clearInterval;
  exitFn?: (code: number) => void;
  nowMsFn?: () => number;
  logger?: ComponentLogger;
};

export type WorkerRuntime = {
  start: () => Promise<void>;
  shutdown: (signal: NodeJS.Signals | "manual") => Promise<void>;
};

async function waitForDrain(batchPromise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  try {
    const result = await Promise.race([
      batchPromise.then(() => "drained" as const),
      new Promise<"timeout">((resolve) => {
        timeoutId = setTimeout(() => resolve("timeout"), timeoutMs);
      }),
    ]);
    return result === "drained";
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Ticks on a fixed interval and runs every job whose own interval has elapsed.
 * At most one batch is in flight; shutdown aborts the batch's signal and waits
 * up to `shutdownTimeoutMs` for it before exiting.
 */
export function createWorkerRuntime(options: CreateWorkerRuntimeOptions): WorkerRuntime {
  const setIntervalFn = options.setIntervalFn ?? setInterval;
  const clearIntervalFn = options.clearIntervalFn ?? clearInterval;
  const exitFn = options.exitFn ?? process.exit;
  const nowMsFn = options.nowMsFn ?? Date.now;
  const logger = options.logger ?? createComponentLogger("worker-runtime");

  const abortController = new AbortController();
  const lastRunAtMs = new Map<string, number>();
  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlightBatch: Promise<void> | null = null;
  let shuttingDown = false;
  let shutdownPromise: Promise<void> | null = null;

  function isDue(job: WorkerJob, nowMs: number): boolean {
    const last = lastRunAtMs.get(job.name);
    return last === undefined || nowMs - last >= job.intervalMs;
  }

  async function processCycle() {
    if (shuttingDown) {
      return;
    }
    if (inFlightBatch) {
      logger.warn("worker.runtime.tick_skipped", { tickIntervalMs: options.tickIntervalMs });
      return;
    }

    const nowMs = nowMsFn();
    const due = options.jobs.filter((job) => isDue(job, nowMs));
    if (due.length === 0) {
      return;
    }

    inFlightBatch = (async () => {
      try {
        for (const job of due) {
          if (abortController.signal.aborted) {
            return;
          }
          try {
            const result = await job.run({ signal: abortController.signal });
            lastRunAtMs.set(job.name, nowMs);
            logger.info("worker.job.completed", { job: job.name, result });
          } catch (error) {
            logger.error("worker.job.failed", { job: job.name, error: errorMessage(error) });
          }
        }
      } finally {
        inFlightBatch = null;
      }
    })();

    await inFlightBatch;
  }

  async function start() {
    await processCycle();
    if (shuttingDown) {
      return;
    }
    timer = setIntervalFn(() => {
      void processCycle();
    }, options.tickIntervalMs);
    logger.info("worker.runtime.started", {
      tickIntervalMs: options.tickIntervalMs,
      jobs: options.jobs.map((job) => ({ name: job.name, intervalMs: job.intervalMs })),
      shutdownTimeoutMs: options.shutdownTimeoutMs,
    });
  }

  async function shutdown(signal: NodeJS.Signals | "manual") {
    if (shutdownPromise) {
      return shutdownPromise;
    }

    shuttingDown = true;
    shutdownPromise = (async () => {
      if (timer) {
        clearIntervalFn(timer);
        timer = null;
      }
      abortController.abort();

      let exitCode = 0;
      if (inFlightBatch) {
        const drained = await waitForDrain(inFlightBatch, options.shutdownTimeoutMs);
        if (!drained) {
          exitCode = 1;
          logger.error("worker.runtime.drain_timeout", {
            signal,
            shutdownTimeoutMs: options.shutdownTimeoutMs,
          });
        }
      }

      logger.info("worker.runtime.shutdown", { signal, exitCode });
      exitFn(exitCode);
    })();

    return shutdownPromise;
  }

  return {
    start,
    shutdown,
  };
}
