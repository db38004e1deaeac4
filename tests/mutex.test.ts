import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { Mutex } from '../src/engine/mutex.js';

test('mutex admits waiters in arrival order', async () => {
  const mutex = new Mutex();
  const order: number[] = [];

  const first = await mutex.acquire();
  const waiters = [1, 2, 3].map((n) =>
    mutex.runExclusive(async () => {
      order.push(n);
      await sleep(1);
    }),
  );
  assert.equal(mutex.pending, 3);

  first();
  await Promise.all(waiters);
  assert.deepEqual(order, [1, 2, 3]);
  assert.equal(mutex.isLocked, false);
});

test('runExclusive releases the lock when the callback throws', async () => {
  const mutex = new Mutex();
  await assert.rejects(
    mutex.runExclusive(() => {
      throw new Error('boom');
    }),
    /boom/,
  );
  assert.equal(mutex.isLocked, false);
  assert.equal(await mutex.runExclusive(() => 42), 42);
});

test('calling a release twice has no further effect', async () => {
  const mutex = new Mutex();
  const release = await mutex.acquire();
  const next = mutex.acquire();
  release();
  release();

  const releaseNext = await next;
  assert.equal(mutex.isLocked, true);
  releaseNext();
  assert.equal(mutex.isLocked, false);
});
