export interface BoundedRunResult<T, R> {
  completed: Array<{ item: T; result: R }>;
  skipped: T[];
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once
 * `signal` aborts, items that have not started are reported as skipped;
 * items already started run to completion.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<BoundedRunResult<T, R>> {
  const completed: Array<{ index: number; item: T; result: R }> = [];
  const skipped: Array<{ index: number; item: T }> = [];
  const queue = items.map((item, index) => ({ item, index }));

  const lane = async (): Promise<void> => {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const { item, index } = next;

      if (signal?.aborted === true) {
        skipped.push({ index, item });
        continue;
      }

      const result = await worker(item);
      completed.push({ index, item, result });
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => lane());
  await Promise.all(lanes);

  return {
    completed: completed
      .sort((left, right) => left.index - right.index)
      .map(({ item, result }) => ({ item, result })),
    skipped: skipped
      .sort((left, right) => left.index - right.index)
      .map(({ item }) => item)
  };
}

export class TimeoutError extends Error {
  public constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms.`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
