import { describe, it, expect } from 'vitest';
import { createConcurrencyLimiter } from '../lib/concurrency.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createConcurrencyLimiter', () => {
  it('starts queued tasks in order as slots free up', async () => {
    const runLimited = createConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const results = gates.map((gate, index) => runLimited(async () => {
      started.push(index);
      await gate.promise;
      return index;
    }));

    await Promise.resolve();
    expect(started).toEqual([0, 1]);

    gates[0].resolve();
    await results[0];
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2]);
  });

  it('frees the slot when a task fails', async () => {
    const runLimited = createConcurrencyLimiter(1);
    const failing = runLimited(async () => {
      throw new Error('boom');
    });
    const next = runLimited(async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('treats a limit below one as one', async () => {
    const runLimited = createConcurrencyLimiter(0);
    await expect(runLimited(async () => 'ran')).resolves.toBe('ran');
  });
});
