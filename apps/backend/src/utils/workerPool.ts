/**
 * Runs tasks with at most `concurrency` in flight. Results keep task order.
 * After the first rejection no further task starts; the pool rejects with
 * that error once in-flight tasks settle.
 */
export const runPool = async <T>(tasks: ReadonlyArray<() => Promise<T>>, concurrency: number): Promise<T[]> => {
  const results: T[] = new Array<T>(tasks.length);
  const width = Math.max(1, Math.min(Math.trunc(concurrency) || 1, tasks.length));
  const failures: unknown[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < tasks.length) {
      const index = next++;
      try {
        results[index] = await tasks[index]();
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.allSettled(Array.from({ length: width }, worker));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
};

export default runPool;
