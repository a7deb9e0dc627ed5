import { describeError } from "../errors.js";
import type { ContextLogger } from "../logger.js";

/**
 * Handle a task receives for the worker running it. `resource()` returns the
 * worker's own resource, acquiring it on first use.
 */
export type WorkerContext<R> = {
  workerId: number;
  resource: () => Promise<R>;
};

export type PoolOptions<R> = {
  width: number;
  acquire?: (workerId: number) => Promise<R>;
  release?: (resource: R, workerId: number) => Promise<void>;
  logger?: ContextLogger;
};

export type PoolFailure<T> = {
  item: T;
  index: number;
  error: unknown;
};

export type PoolResult<T> = {
  completed: number;
  failures: PoolFailure<T>[];
  /** Number of resources acquired (and released) during the run. */
  resources: number;
};

type Registered<R> = { workerId: number; resource: R };

/**
 * Runs `task` over `items` on at most `width` concurrent workers and resolves
 * once every task settled. Resources acquired by workers are released together
 * afterwards, whatever happened during the run.
 */
export async function runPool<T, R = never>(
  items: readonly T[],
  options: PoolOptions<R>,
  task: (item: T, context: WorkerContext<R>, index: number) => Promise<void>
): Promise<PoolResult<T>> {
  const registry: Registered<R>[] = [];
  const failures: PoolFailure<T>[] = [];
  let completed = 0;
  let cursor = 0;

  const width = Math.max(1, Math.min(options.width, items.length));

  const createContext = (workerId: number): WorkerContext<R> => {
    let pending: Promise<R> | undefined;
    return {
      workerId,
      resource: () => {
        if (!pending) {
          const { acquire } = options;
          if (!acquire) {
            return Promise.reject(new Error("Pool was created without a resource factory."));
          }
          pending = acquire(workerId).then(
            (resource) => {
              registry.push({ workerId, resource });
              return resource;
            },
            (error: unknown) => {
              // not cached: the next task on this worker tries again
              pending = undefined;
              throw error;
            }
          );
        }
        return pending;
      }
    };
  };

  const runWorker = async (workerId: number) => {
    const context = createContext(workerId);
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        await task(items[index], context, index);
        completed += 1;
      } catch (error) {
        failures.push({ item: items[index], index, error });
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: width }, (_, workerId) => runWorker(workerId)));
  } finally {
    await releaseAll(registry, options);
  }

  return { completed, failures, resources: registry.length };
}

async function releaseAll<R>(registry: Registered<R>[], options: PoolOptions<R>) {
  const { release } = options;
  if (!release || registry.length === 0) return;
  const results = await Promise.allSettled(
    registry.map((entry) => release(entry.resource, entry.workerId))
  );
  results.forEach((result, index) => {
    if (result.status === "rejected") {
      options.logger?.warn("pool.release.failed", {
        workerId: registry[index].workerId,
        error: describeError(result.reason)
      });
    }
  });
  options.logger?.debug("pool.release.done", { resources: registry.length });
}
