import { settleWithConcurrency } from './fan-out';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('settleWithConcurrency', () => {
  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await settleWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (value) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
      return value;
    });

    expect(peak).toBe(3);
  });

  it('should keep input order regardless of completion order', async () => {
    const gates = [deferred(), deferred(), deferred()];

    const pending = settleWithConcurrency([0, 1, 2], 3, async (index) => {
      await gates[index].promise;
      return `item-${index}`;
    });
    gates[2].resolve();
    gates[0].resolve();
    gates[1].resolve();

    const results = await pending;
    expect(results).toEqual([
      { status: 'fulfilled', value: 'item-0' },
      { status: 'fulfilled', value: 'item-1' },
      { status: 'fulfilled', value: 'item-2' },
    ]);
  });

  it('should settle failures without stopping the other workers', async () => {
    const failure = new Error('repo unavailable');

    const results = await settleWithConcurrency(['a', 'b', 'c'], 2, async (name) => {
      if (name === 'b') {
        throw failure;
      }
      return name.toUpperCase();
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'A' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'C' },
    ]);
  });

  it('should handle an empty input', async () => {
    const worker = jest.fn(async () => 1);

    await expect(settleWithConcurrency([], 5, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});
