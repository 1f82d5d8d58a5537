type Listener<S> = (state: S) => void;

/**
 * Holds one state value and notifies subscribers on every emission.
 * `subscribe` and `getState` are bound so they can be handed straight to
 * `useSyncExternalStore`.
 */
export class Cubit<S> {
  private current: S;
  private readonly listeners = new Set<Listener<S>>();
  private closed = false;

  constructor(initialState: S) {
    this.current = initialState;
  }

  get state(): S {
    return this.current;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getState = (): S => this.current;

  subscribe = (listener: Listener<S>): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  close(): void {
    this.closed = true;
    this.listeners.clear();
  }

  protected emit(state: S): void {
    // A handler that outlives close() still runs to the end; its states go nowhere.
    if (this.closed) return;
    this.current = state;
    this.listeners.forEach((listener) => listener(state));
  }
}

/**
 * A cubit driven by events. Each `add` runs its handler to completion and the
 * returned promise settles once the handler's last state has been emitted.
 * Handlers of different events are not serialized against each other.
 */
export abstract class Bloc<E, S> extends Cubit<S> {
  add(event: E): Promise<void> {
    return this.onEvent(event);
  }

  protected abstract onEvent(event: E): Promise<void>;
}
