import type { Engine } from '../engine/engine.js';
import type { Subscription } from '../engine/event-bus.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../log/logger.js';
import type { Protocol } from '../protocol/codec.js';
import type { Connection } from './connection.js';

const log = createLogger('session');

export type SessionEnd = 'outbound' | 'inbound' | 'stopped';

/**
 * Couples one connection to an engine: an outbound loop forwarding bus events
 * and an inbound loop feeding decoded commands to the engine. Whichever loop
 * finishes first ends the session.
 */
export class Session<S, C, E> {
  private readonly controller = new AbortController();

  constructor(
    private readonly engine: Engine<S, C, E>,
    private readonly protocol: Protocol<S, C, E>,
    private readonly connection: Connection,
  ) {}

  get id(): string {
    return this.connection.id;
  }

  stop(): void {
    this.controller.abort();
  }

  async run(): Promise<SessionEnd> {
    const { signal } = this.controller;
    let opened: { snapshot: S; subscription: Subscription<E> };
    try {
      // Snapshot and subscription are taken together so no change falls between them.
      opened = { snapshot: this.engine.snapshot(), subscription: this.engine.subscribe() };
    } catch (err) {
      log.error(`Could not attach ${this.id} to the ${this.engine.name} engine: ${errorMessage(err)}`);
      this.controller.abort();
      this.connection.close();
      return 'outbound';
    }
    const { snapshot, subscription } = opened;
    log.info(`Observer ${this.id} connected to the ${this.engine.name} engine`);

    try {
      try {
        await this.connection.send(this.protocol.encodeEvent(this.protocol.stateChanged(snapshot)));
      } catch (err) {
        log.warn(`Failed to send initial state to ${this.id}: ${errorMessage(err)}`);
        return 'outbound';
      }

      const stopped = new Promise<SessionEnd>((resolve) => {
        if (signal.aborted) resolve('stopped');
        signal.addEventListener('abort', () => resolve('stopped'), { once: true });
      });
      const end = await Promise.race([this.outbound(subscription, signal), this.inbound(signal), stopped]);
      log.info(`Observer ${this.id} disconnected (${end} loop finished)`);
      return end;
    } finally {
      this.controller.abort();
      subscription.close();
      this.connection.close();
    }
  }

  private async outbound(subscription: Subscription<E>, signal: AbortSignal): Promise<SessionEnd> {
    for (;;) {
      const received = await subscription.recv(signal);
      switch (received.type) {
        case 'closed':
          return 'outbound';
        case 'lagged':
          log.warn(`Observer ${this.id} lagged behind, ${received.skipped} events dropped`);
          break;
        case 'event':
          try {
            await this.connection.send(this.protocol.encodeEvent(received.event));
          } catch (err) {
            log.info(`Sending to ${this.id} failed: ${errorMessage(err)}`);
            return 'outbound';
          }
          break;
      }
    }
  }

  private async inbound(signal: AbortSignal): Promise<SessionEnd> {
    try {
      for await (const frame of this.connection.frames(signal)) {
        const decoded = this.protocol.decodeCommand(frame);
        if (decoded.ok) {
          await this.engine.handle(decoded.command);
        } else if (decoded.reason === 'unsupported') {
          this.engine.reportUnsupported(decoded.commandType);
        } else {
          log.warn(`Dropping malformed frame from ${this.id}: ${decoded.message}`);
        }
      }
    } catch (err) {
      log.warn(`Reading from ${this.id} failed: ${errorMessage(err)}`);
    }
    return 'inbound';
  }
}
