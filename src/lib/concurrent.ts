import { err, ok, type Result } from "./result";

/**
 * Run async tasks with a concurrency limit.
 * Results come back in input order, each settled into a Result so one
 * task's rejection never affects another's slot.
 */
export async function runConcurrent<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number
): Promise<Result<T, unknown>[]> {
  const results: Result<T, unknown>[] = new Array(tasks.length);
  let cursor = 0;

  async function worker() {
    while (cursor < tasks.length) {
      const i = cursor++;
      const task = tasks[i];
      if (!task) break;
      try {
        results[i] = ok(await task());
      } catch (error) {
        results[i] = err(error);
      }
    }
  }

  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
