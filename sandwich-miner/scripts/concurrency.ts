export async function mapLimit<T, R>(
  items: T[],
  limit: number,
  asyncMapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (limit < 1) {
    throw new Error("mapLimit requires limit >= 1");
  }

  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (true) {
      const currentIndex = nextIndex;
      nextIndex += 1;
      if (currentIndex >= items.length) {
        return;
      }
      results[currentIndex] = await asyncMapper(items[currentIndex], currentIndex);
    }
  }

  const workerCount = Math.min(limit, items.length);
  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);
  return results;
}

/** Runs async sections one at a time, in call order. */
export function createMutex(): {
  runExclusive: <T>(fn: () => Promise<T>) => Promise<T>;
  isLocked: () => boolean;
} {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
      pending += 1;
      const result = tail.then(fn);
      tail = result.then(
        () => {
          pending -= 1;
        },
        () => {
          pending -= 1;
        },
      );
      return result;
    },
    isLocked() {
      return pending > 0;
    },
  };
}
