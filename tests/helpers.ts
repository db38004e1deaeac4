import { setLogSink, type LogRecord } from '../src/log/logger.js';
import type { Subscription } from '../src/engine/event-bus.js';
import type { ProcessOutput, ProcessRunner } from '../src/types.js';

/** Routes log output into an array for the duration of a test. */
export function captureLogs(): { records: LogRecord[]; restore: () => void } {
  const records: LogRecord[] = [];
  const restore = setLogSink((record) => {
    records.push(record);
  });
  return { records, restore };
}

/** Events already queued for the subscriber, without waiting for more. */
export async function pendingEvents<E>(subscription: Subscription<E>): Promise<E[]> {
  const events: E[] = [];
  while (subscription.pending > 0) {
    const received = await subscription.recv();
    if (received.type === 'event') events.push(received.event);
  }
  return events;
}

/** Receives events until `done` accepts one, failing after `timeoutMs`. */
export async function collectUntil<E>(
  subscription: Subscription<E>,
  done: (event: E) => boolean,
  timeoutMs = 2000,
): Promise<E[]> {
  const signal = AbortSignal.timeout(timeoutMs);
  const events: E[] = [];
  for (;;) {
    const received = await subscription.recv(signal);
    if (received.type === 'closed') {
      throw new Error(`Gave up after ${events.length} events: ${JSON.stringify(events)}`);
    }
    if (received.type === 'event') {
      events.push(received.event);
      if (done(received.event)) return events;
    }
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/** Replays one scripted output list per call; the last list repeats. */
export function scriptedRunner(...runs: ProcessOutput[][]): { runner: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: ProcessRunner = async function* (command, args) {
    const outputs = runs[Math.min(calls.length, runs.length - 1)] ?? [];
    calls.push({ command, args: [...args] });
    for (const output of outputs) {
      await Promise.resolve();
      yield output;
    }
  };
  return { runner, calls };
}

/** Emits `lines` immediately, then holds the final output back until `release` is called. */
export function gatedRunner(
  lines: ProcessOutput[],
  last: ProcessOutput = { type: 'Completed', code: 0, signal: null },
): { runner: ProcessRunner; release: () => void } {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const runner: ProcessRunner = async function* () {
    for (const line of lines) yield line;
    await gate;
    yield last;
  };
  return { runner, release };
}

export const stdout = (line: string): ProcessOutput => ({ type: 'Stdout', line });
export const stderr = (line: string): ProcessOutput => ({ type: 'Stderr', line });
export const exited = (code: number): ProcessOutput => ({ type: 'Completed', code, signal: null });
