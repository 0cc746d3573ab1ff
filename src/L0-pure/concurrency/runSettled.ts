/**
 * Run async tasks with at most `width` in flight and collect every outcome.
 *
 * A rejected task never cancels its siblings; the returned array holds one
 * settled result per task, in task order, once all of them have finished.
 */
export async function runSettled<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  width: number,
): Promise<PromiseSettledResult<T>[]> {
  const results: PromiseSettledResult<T>[] = new Array(tasks.length)
  let next = 0

  async function worker(): Promise<void> {
    while (next < tasks.length) {
      const index = next++
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() }
      } catch (reason: unknown) {
        results[index] = { status: 'rejected', reason }
      }
    }
  }

  const limit = Number.isFinite(width) ? Math.floor(width) : tasks.length
  const workerCount = Math.max(1, Math.min(limit, tasks.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}
