import { Mutex } from '../mutex';
import { createDeferred } from '../__mocks__/transport';

describe('Mutex', () => {
  it('runs tasks one at a time in call order', async () => {
    const mutex = new Mutex();
    const gate = createDeferred<void>();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    expect(mutex.isLocked).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('keeps going after a rejected task', async () => {
    const mutex = new Mutex();

    const failing = mutex.runExclusive(() => Promise.reject(new Error('boom')));
    const next = mutex.runExclusive(() => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });
});
