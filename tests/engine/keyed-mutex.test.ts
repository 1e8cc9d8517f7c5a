import { KeyedMutex } from '../../src/engine/keyed-mutex';
import { deferred } from '../helpers/fakes';

describe('KeyedMutex', () => {
  test('runs sections for one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('run_1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('run_1', async () => {
      order.push('second');
    });

    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  test('different keys do not wait for each other', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('run_1', () => gate.promise);
    await expect(mutex.runExclusive('run_2', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await held;
  });

  test('a failing section releases the lock', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('run_1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('run_1', async () => 1)).resolves.toBe(1);
    expect(mutex.size).toBe(0);
  });
});
