/**
 * EventBus: publish/subscribe event system.
 *
 * Handlers run synchronously in registration order. Errors in handlers
 * (including rejected promises from async handlers) are caught and
 * logged so one dashboard widget cannot break the poll cycle.
 */

import type {
  EventBus as IEventBus,
  EventHandler,
  PollerEvent,
  PollerEventTypeValue,
} from "@plantop/sdk";
import { describeError } from "@plantop/sdk";
import { createLogger } from "@plantop/shared";

const logger = createLogger("EventBus");

export function createEventBus(): IEventBus {
  const handlers = new Map<PollerEventTypeValue, Set<EventHandler>>();
  const wildcardHandlers = new Set<EventHandler>();

  function getOrCreate(type: PollerEventTypeValue): Set<EventHandler> {
    let set = handlers.get(type);
    if (!set) {
      set = new Set();
      handlers.set(type, set);
    }
    return set;
  }

  function safeCall(handler: EventHandler, event: PollerEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error("Async handler error", {
            type: event.type,
            error: describeError(err),
          });
        });
      }
    } catch (err) {
      logger.error("Sync handler error", {
        type: event.type,
        error: describeError(err),
      });
    }
  }

  const bus: IEventBus = {
    on(type: PollerEventTypeValue, handler: EventHandler): () => void {
      const set = getOrCreate(type);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    onAny(handler: EventHandler): () => void {
      wildcardHandlers.add(handler);
      return () => {
        wildcardHandlers.delete(handler);
      };
    },

    emit(event: PollerEvent): void {
      const set = handlers.get(event.type);
      if (set) {
        for (const handler of set) {
          safeCall(handler, event);
        }
      }

      for (const handler of wildcardHandlers) {
        safeCall(handler, event);
      }
    },
  };

  return bus;
}
