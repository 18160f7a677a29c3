import { TicketLock } from '../../../src/core/services/TicketLock.js';

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    release = resolve;
  });
  return { promise, release };
}

describe('TicketLock', () => {
  it('should run tasks for the same key one after another', async () => {
    const lock = new TicketLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.release();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not make different keys wait on each other', async () => {
    const lock = new TicketLock();
    const gate = deferred();
    let otherRan = false;

    const blocked = lock.runExclusive('a', () => gate.promise);
    await lock.runExclusive('b', async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);

    gate.release();
    await blocked;
  });

  it('should keep running successors after a failing task', async () => {
    const lock = new TicketLock();

    const failing = lock.runExclusive('a', async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive('a', async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('should accept new tasks once the queue drains', async () => {
    const lock = new TicketLock();
    await lock.runExclusive('a', async () => 1);
    await expect(lock.runExclusive('a', async () => 2)).resolves.toBe(2);
  });
});
