import { mergeBounded } from './merge';

async function* letters(name: string, count: number, log: string[]): AsyncGenerator<string, void, undefined> {
  log.push(`start ${name}`);
  try {
    for (let i = 1; i <= count; i++) {
      await Promise.resolve();
      yield `${name}${i}`;
    }
  } finally {
    log.push(`close ${name}`);
  }
}

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

describe('mergeBounded', () => {
  it('should run sources one after another with a concurrency of one', async () => {
    const log: string[] = [];

    const values = await drain(
      mergeBounded([() => letters('a', 2, log), () => letters('b', 2, log)], 1),
    );

    expect(values).toEqual(['a1', 'a2', 'b1', 'b2']);
    expect(log).toEqual(['start a', 'close a', 'start b', 'close b']);
  });

  it('should yield every value of every source', async () => {
    const log: string[] = [];

    const values = await drain(
      mergeBounded([() => letters('a', 3, log), () => letters('b', 1, log), () => letters('c', 2, log)], 2),
    );

    expect([...values].sort()).toEqual(['a1', 'a2', 'a3', 'b1', 'c1', 'c2']);
  });

  it('should never start more sources than the limit', async () => {
    let running = 0;
    let peak = 0;
    const source = async function* (): AsyncGenerator<number, void, undefined> {
      running++;
      peak = Math.max(peak, running);
      try {
        await Promise.resolve();
        yield 1;
        await Promise.resolve();
        yield 2;
      } finally {
        running--;
      }
    };

    const values = await drain(mergeBounded([source, source, source, source, source], 2));

    expect(values).toHaveLength(10);
    expect(peak).toBe(2);
  });

  it('should close running sources when the consumer stops early', async () => {
    const log: string[] = [];

    for await (const value of mergeBounded([() => letters('a', 5, log), () => letters('b', 5, log)], 2)) {
      if (value === 'a1' || value === 'b1') {
        break;
      }
    }

    expect(log).toEqual(['start a', 'start b', 'close a', 'close b']);
  });

  it('should finish at once without sources', async () => {
    expect(await drain(mergeBounded<string>([], 3))).toEqual([]);
  });
});
