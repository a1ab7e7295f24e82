import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { JoinBarrier } from '../engine/join-barrier.js';

describe('JoinBarrier', () => {
  it('resolves true at once when already settled', async () => {
    const barrier = new JoinBarrier(() => true);
    assert.equal(await barrier.wait(), true);
    assert.equal(await barrier.wait(0), true);
    assert.equal(barrier.waiting, 0);
  });

  it('resolves false at once for a zero timeout while unsettled', async () => {
    const barrier = new JoinBarrier(() => false);
    assert.equal(await barrier.wait(0), false);
    assert.equal(barrier.waiting, 0);
  });

  it('keeps waiters parked when released while unsettled', async () => {
    let settled = false;
    const barrier = new JoinBarrier(() => settled);
    const results: boolean[] = [];
    const first = barrier.wait().then((value) => results.push(value));
    const second = barrier.wait(-1).then((value) => results.push(value));

    barrier.release();
    await Promise.resolve();
    assert.equal(barrier.waiting, 2);
    assert.deepEqual(results, []);

    settled = true;
    barrier.release();
    await Promise.all([first, second]);
    assert.deepEqual(results, [true, true]);
    assert.equal(barrier.waiting, 0);
  });

  it('resolves false after the timeout', async () => {
    const barrier = new JoinBarrier(() => false);
    assert.equal(await barrier.wait(10), false);
    assert.equal(barrier.waiting, 0);
  });

  it('reports the predicate at timeout even without a release', async () => {
    let settled = false;
    const barrier = new JoinBarrier(() => settled);
    const pending = barrier.wait(10);
    settled = true;
    assert.equal(await pending, true);
  });

  it('clears the timer of a released waiter', async () => {
    let settled = false;
    const barrier = new JoinBarrier(() => settled);
    const pending = barrier.wait(60_000);
    settled = true;
    barrier.release();
    assert.equal(await pending, true);
    assert.equal(barrier.waiting, 0);
  });
});
