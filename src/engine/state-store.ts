import { Mutex } from './mutex.js';

export type Transition<S> = (current: S) => S | undefined;

export interface UpdateOptions {
  /** Replace without notifying the change listener. */
  silent?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Single authoritative state value. Every write goes through `update`, which
 * runs a synchronous transition while holding the lock; collaborator calls
 * happen before `update` is entered, never inside it.
 */
export class StateStore<S> {
  private current: S;
  private readonly mutex = new Mutex();

  constructor(
    initial: S,
    private readonly onChange: (next: S) => void = () => {},
  ) {
    this.current = deepFreeze(initial);
  }

  /** Values are frozen on write, so the returned snapshot is safe to share. */
  read(): S {
    return this.current;
  }

  /**
   * Applies `transition` under the lock. Returning `undefined` keeps the current
   * value. An exception thrown by the transition leaves the state untouched and
   * propagates to the caller.
   */
  update(transition: Transition<S>, options: UpdateOptions = {}): Promise<S | undefined> {
    return this.mutex.runExclusive(() => {
      const next = transition(this.current);
      if (next === undefined) return undefined;
      this.current = deepFreeze(next);
      if (!options.silent) this.onChange(this.current);
      return this.current;
    });
  }
}
