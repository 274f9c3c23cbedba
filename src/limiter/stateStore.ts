import { Mutex } from "./mutex";

/**
 * Per-client accounting records for one limiter instance.
 *
 * Both operations run their callback while holding the store's lock, so
 * reading, evaluating and mutating a record is never interleaved with
 * another decision on the same store.
 */
export interface StateStore<TState> {
  /**
   * Get-or-create the record for `clientId` and run `mutate` on it.
   * `create` is only called the first time a client is seen.
   */
  evaluate<R>(
    clientId: string,
    create: () => TState,
    mutate: (state: TState) => R
  ): Promise<R>;

  /**
   * Run `read` on the record for `clientId`, or on undefined for a
   * client never seen. Never creates a record.
   */
  inspect<R>(
    clientId: string,
    read: (state: TState | undefined) => R
  ): Promise<R>;

  /** Number of clients with a record. */
  size(): number;
}

/**
 * Map-backed store behind a single coarse lock.
 *
 * Records are kept for the life of the process; nothing evicts idle
 * clients, so memory grows with the number of distinct client ids.
 */
export class InMemoryStateStore<TState> implements StateStore<TState> {
  private readonly states = new Map<string, TState>();
  private readonly lock = new Mutex();

  evaluate<R>(
    clientId: string,
    create: () => TState,
    mutate: (state: TState) => R
  ): Promise<R> {
    return this.lock.runExclusive(() => {
      let state = this.states.get(clientId);
      if (state === undefined) {
        state = create();
        this.states.set(clientId, state);
      }
      return mutate(state);
    });
  }

  inspect<R>(
    clientId: string,
    read: (state: TState | undefined) => R
  ): Promise<R> {
    return this.lock.runExclusive(() => read(this.states.get(clientId)));
  }

  size(): number {
    return this.states.size;
  }
}
