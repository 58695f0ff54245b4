import { type EventSource } from "@rendezvous/core";

import { type EventManager } from "../events/eventManager";

interface BindEventSourceInput {
  source: EventSource;
  manager: EventManager;
  onError?(error: unknown, eventName: string): void;
}

export interface EventSourceBinding {
  /** Stop forwarding notifications and release the handler. */
  stop: () => void;
  /** Notifications forwarded to the manager so far. */
  readonly dispatchedCount: number;
}

/**
 * Forwards every notification from `source` into `manager.dispatch`.
 */
export function bindEventSource(input: BindEventSourceInput): EventSourceBinding {
  let dispatched = 0;
  let stopped = false;

  const unsubscribe = input.source.onEvent((eventName, args) => {
    if (stopped) return;

    try {
      input.manager.dispatch(eventName, args);
      dispatched += 1;
    } catch (error) {
      input.onError?.(error, eventName);
    }
  });

  return {
    stop: () => {
      if (stopped) return;
      stopped = true;
      unsubscribe();
    },
    get dispatchedCount() { return dispatched; }
  };
}
