import { EventEmitter } from 'node:events';
import { Channel } from './channel.js';

// Delivery is lossy by contract: each subscriber owns a bounded queue and a
// subscriber that falls behind loses its oldest events instead of stalling
// publishers. The loss is reported to it as a 'lagged' receive.

export type Received<E> =
  | { type: 'event'; event: E }
  | { type: 'lagged'; skipped: number }
  | { type: 'closed' };

const EVENT = 'event';

export class Subscription<E> {
  constructor(
    private readonly queue: Channel<E>,
    private readonly detach: () => void,
  ) {}

  get pending(): number {
    return this.queue.size;
  }

  async recv(signal?: AbortSignal): Promise<Received<E>> {
    const skipped = this.queue.takeDropped();
    if (skipped > 0) return { type: 'lagged', skipped };

    const result = await this.queue.next(signal);
    if (result.done) return { type: 'closed' };
    return { type: 'event', event: result.value };
  }

  close(): void {
    this.detach();
    this.queue.close();
  }
}

export class EventBus<E> {
  private readonly emitter = new EventEmitter();
  private dropped = 0;

  constructor(private readonly capacity = 100) {
    // One listener per connected observer; there is no meaningful upper bound.
    this.emitter.setMaxListeners(0);
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount(EVENT);
  }

  /** Events lost across all subscribers since the bus was created. */
  get droppedCount(): number {
    return this.dropped;
  }

  publish(event: E): void {
    this.emitter.emit(EVENT, event);
  }

  subscribe(): Subscription<E> {
    const queue = new Channel<E>(this.capacity);
    const listener = (event: E): void => {
      if (queue.push(event) === 'dropped-oldest') this.dropped++;
    };
    this.emitter.on(EVENT, listener);
    return new Subscription(queue, () => {
      this.emitter.off(EVENT, listener);
    });
  }
}
