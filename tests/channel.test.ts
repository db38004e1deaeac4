import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Channel } from '../src/engine/channel.js';

describe('Channel', () => {
  it('delivers items in push order', async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.push(2);
    channel.push(3);

    assert.deepEqual(await channel.next(), { done: false, value: 1 });
    assert.deepEqual(await channel.next(), { done: false, value: 2 });
    assert.deepEqual(await channel.next(), { done: false, value: 3 });
  });

  it('hands a pushed item straight to a waiting reader', async () => {
    const channel = new Channel<string>(1);
    const pending = channel.next();
    assert.equal(channel.push('x'), 'accepted');
    assert.deepEqual(await pending, { done: false, value: 'x' });
    assert.equal(channel.size, 0);
  });

  it('drops the oldest item when full and counts the drop', async () => {
    const channel = new Channel<number>(2);
    assert.equal(channel.push(1), 'accepted');
    assert.equal(channel.push(2), 'accepted');
    assert.equal(channel.push(3), 'dropped-oldest');

    assert.equal(channel.takeDropped(), 1);
    assert.equal(channel.takeDropped(), 0);
    assert.deepEqual(await channel.next(), { done: false, value: 2 });
    assert.deepEqual(await channel.next(), { done: false, value: 3 });
  });

  it('rejects a capacity below one', () => {
    assert.throws(() => new Channel(0), RangeError);
  });

  it('drains buffered items after close, then reports done', async () => {
    const channel = new Channel<number>();
    channel.push(7);
    channel.close();

    assert.equal(channel.push(8), 'closed');
    assert.deepEqual(await channel.next(), { done: false, value: 7 });
    assert.equal((await channel.next()).done, true);
  });

  it('wakes waiting readers on close', async () => {
    const channel = new Channel<number>();
    const pending = channel.next();
    channel.close();
    assert.equal((await pending).done, true);
  });

  it('resolves a pending read as done when its signal aborts', async () => {
    const channel = new Channel<number>();
    const controller = new AbortController();
    const pending = channel.next(controller.signal);
    controller.abort();

    assert.equal((await pending).done, true);
    // The aborted reader must not swallow later items.
    channel.push(1);
    assert.deepEqual(await channel.next(), { done: false, value: 1 });
  });

  it('iterates until closed', async () => {
    const channel = new Channel<string>();
    channel.push('a');
    channel.push('b');
    channel.close();

    const seen: string[] = [];
    for await (const item of channel) seen.push(item);
    assert.deepEqual(seen, ['a', 'b']);
  });
});
