type Pending<T> = Promise<{ id: number; result: IteratorResult<T> }>;

interface Running<T> {
  iterator: AsyncIterator<T>;
  next: Pending<T> | null;
}

/**
 * Interleave async sequences, running at most `concurrency` of them at a time.
 * Sources start in order as earlier ones finish. Each source is pulled only
 * after its previous value was consumed.
 */
export async function* mergeBounded<T>(
  sources: Array<() => AsyncIterator<T>>,
  concurrency: number,
): AsyncGenerator<T, void, undefined> {
  const queue = [...sources];
  const running = new Map<number, Running<T>>();
  let nextId = 0;

  const pull = (id: number, iterator: AsyncIterator<T>): Pending<T> =>
    iterator.next().then(result => ({ id, result }));

  const launch = (): boolean => {
    const factory = queue.shift();
    if (!factory) {
      return false;
    }
    const id = nextId++;
    const iterator = factory();
    running.set(id, { iterator, next: pull(id, iterator) });
    return true;
  };

  try {
    const limit = Math.max(1, concurrency);
    while (running.size < limit) {
      if (!launch()) break;
    }

    while (running.size > 0) {
      const pending: Array<Pending<T>> = [];
      for (const entry of running.values()) {
        if (entry.next) pending.push(entry.next);
      }

      const { id, result } = await Promise.race(pending);
      const entry = running.get(id);
      if (!entry) {
        continue;
      }

      if (result.done) {
        running.delete(id);
        launch();
        continue;
      }

      entry.next = null;
      yield result.value;
      entry.next = pull(id, entry.iterator);
    }
  } finally {
    const closing: Array<Promise<unknown>> = [];
    for (const entry of running.values()) {
      if (entry.iterator.return) {
        closing.push(entry.iterator.return());
      }
    }
    await Promise.all(closing);
  }
}
