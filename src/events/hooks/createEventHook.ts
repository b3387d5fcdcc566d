/**
 * Small typed pub/sub used to fan one Seyfert event out to many listeners.
 *
 * `make()` returns `[on, once, off, emit, clear]` so each hook module can
 * export them under event-specific names.
 */
export type EventHookListener<Args extends unknown[]> = (...args: Args) => Promise<void> | void;

export type EventHookTuple<Args extends unknown[]> = readonly [
  on: (listener: EventHookListener<Args>) => () => void,
  once: (listener: EventHookListener<Args>) => () => void,
  off: (listener: EventHookListener<Args>) => boolean,
  emit: (...args: Args) => Promise<void>,
  clear: () => void,
];

export function createEventHook<Args extends unknown[]>(label = "events") {
  const listeners = new Set<EventHookListener<Args>>();

  const off = (listener: EventHookListener<Args>): boolean => listeners.delete(listener);

  const on = (listener: EventHookListener<Args>): (() => void) => {
    listeners.add(listener);
    return () => {
      off(listener);
    };
  };

  const once = (listener: EventHookListener<Args>): (() => void) => {
    const wrapper: EventHookListener<Args> = async (...args) => {
      off(wrapper);
      await listener(...args);
    };
    return on(wrapper);
  };

  /** Runs every listener; one failing listener never stops the others. */
  const emit = async (...args: Args): Promise<void> => {
    const results = await Promise.allSettled(
      [...listeners].map(async (listener) => listener(...args)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.error(`[${label}] Listener failed:`, result.reason);
      }
    }
  };

  const clear = (): void => listeners.clear();

  return {
    make: (): EventHookTuple<Args> => [on, once, off, emit, clear],
  };
}
