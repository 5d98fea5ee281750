export interface PoolOptions<S> {
  concurrency: number;
  setup: (slotIndex: number) => S;
  teardown?: (slot: S) => Promise<void>;
  shouldStop?: () => boolean;
}

/**
 * Runs `worker` over `items` on a fixed number of slots. Each slot gets its own state from
 * `setup` (kept for the slot's lifetime) and stops picking up items once `shouldStop` is true.
 */
export async function processWithConcurrency<T, S>(
  items: readonly T[],
  worker: (item: T, slot: S) => Promise<void>,
  options: PoolOptions<S>,
): Promise<void> {
  let index = 0;
  const slotCount = Math.max(1, Math.min(options.concurrency, items.length));
  const slots = new Array(slotCount).fill(null).map(async (_, slotIndex) => {
    const state = options.setup(slotIndex);
    try {
      while (true) {
        if (options.shouldStop?.()) {
          break;
        }
        const current = index;
        index += 1;
        if (current >= items.length) {
          break;
        }
        await worker(items[current], state);
      }
    } finally {
      await options.teardown?.(state);
    }
  });
  await Promise.all(slots);
}
