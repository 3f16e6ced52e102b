import { describe, it, expect } from 'vitest';
import { sleep, withTimeout } from './timing.js';

describe('sleep', () => {
  it('returns early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    await sleep(5_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('returns at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    await sleep(5_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });
});

describe('withTimeout', () => {
  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 100, () => new Error('late'))).resolves.toBe(7);
  });

  it('passes through a rejection that arrives in time', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 100, () => new Error('late'))).rejects.toThrow('refused');
  });

  it('rejects with the timeout error when the promise is too slow', async () => {
    const slow = new Promise<number>(resolve => setTimeout(() => resolve(1), 200));
    await expect(withTimeout(slow, 10, () => new Error('no response within 0.01s'))).rejects.toThrow('no response within 0.01s');
  });
});
