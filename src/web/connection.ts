import { WebSocket, type RawData } from 'ws';
import { Channel } from '../engine/channel.js';

/** One observer's bidirectional message stream, independent of the socket library. */
export interface Connection {
  readonly id: string;
  /** Rejects once the peer is gone. */
  send(data: string): Promise<void>;
  /** Incoming text frames; ends when the peer disconnects or `signal` aborts. */
  frames(signal: AbortSignal): AsyncIterable<string>;
  close(): void;
}

let nextId = 1;

export function connectionId(prefix: string): string {
  return `${prefix}-${nextId++}`;
}

function rawToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf-8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf-8');
  return raw.toString('utf-8');
}

export class WsConnection implements Connection {
  readonly id = connectionId('ws');
  private readonly incoming = new Channel<string>();

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (raw) => {
      this.incoming.push(rawToString(raw));
    });
    ws.on('close', () => this.incoming.close());
    ws.on('error', () => this.incoming.close());
  }

  send(data: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`Connection ${this.id} is not open`));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  frames(signal: AbortSignal): AsyncIterable<string> {
    return this.incoming.iterate(signal);
  }

  close(): void {
    this.incoming.close();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

/** In-process connection for tests: frames are delivered by hand and sends are recorded. */
export class MemoryConnection implements Connection {
  readonly id = connectionId('mem');
  readonly sent: string[] = [];
  private readonly incoming = new Channel<string>();
  private readonly outgoing = new Channel<string>();
  private open = true;

  get isOpen(): boolean {
    return this.open;
  }

  async send(data: string): Promise<void> {
    if (!this.open) throw new Error(`Connection ${this.id} is closed`);
    this.sent.push(data);
    this.outgoing.push(data);
  }

  frames(signal: AbortSignal): AsyncIterable<string> {
    return this.incoming.iterate(signal);
  }

  /** Simulates a frame arriving from the peer. */
  deliver(frame: string): void {
    this.incoming.push(frame);
  }

  /** Resolves with the next frame sent to the peer, or null once closed. */
  async nextSent(signal?: AbortSignal): Promise<string | null> {
    const result = await this.outgoing.next(signal);
    return result.done ? null : result.value;
  }

  /** Simulates the peer going away. */
  disconnect(): void {
    this.incoming.close();
  }

  close(): void {
    this.open = false;
    this.incoming.close();
    this.outgoing.close();
  }
}
