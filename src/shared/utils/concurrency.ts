/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const poolSize = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: Array<Promise<void>> = [];
  for (let lane = 0; lane < poolSize; lane += 1) {
    lanes.push(runLane());
  }
  await Promise.all(lanes);
  return results;
}
