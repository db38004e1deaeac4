import { CommandRejectedError, errorMessage } from '../errors.js';
import type { Logger } from '../log/logger.js';
import type { Subscription } from './event-bus.js';

export type EngineName = 'install' | 'system';

/** What a transport session needs from a command processor. */
export interface Engine<S, C, E> {
  readonly name: EngineName;
  /** Current state; pair with `subscribe` in the same synchronous step. */
  snapshot(): S;
  subscribe(): Subscription<E>;
  /** Never rejects; outcomes are published on the bus. */
  handle(command: C): Promise<void>;
  /** Reports a well-formed command this engine does not implement. */
  reportUnsupported(commandType: string): void;
  /** Resolves once no background build or switch is running. */
  settled(): Promise<void>;
}

export function rejectCommand(command: string, state: { type: string }): never {
  throw new CommandRejectedError(`Cannot handle ${command} in state ${state.type}`);
}

/** Logs a failure caught at the `handle` boundary and returns the message to publish. */
export function describeFailure(log: Logger, command: string, err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof CommandRejectedError) {
    log.warn(`Rejected ${command}: ${message}`);
  } else {
    log.error(`${command} failed: ${message}`);
  }
  return message;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
