/**
 * @ordergrid/events: In-memory event bus.
 *
 * Keeps every published event in an ordered log and dispatches it to
 * subscribers. Suitable for:
 * - Tests that assert on emitted events
 * - Single-process deployments with in-process consumers
 *
 * All state is lost on process exit.
 */

import type { DomainEvent } from "@ordergrid/types";
import type {
  EventHandler,
  EventPublisher,
  PublishedEvent,
  Subscription,
} from "./types.js";
import { EventPublishError } from "./types.js";

export class InMemoryEventBus implements EventPublisher {
  private readonly _log: PublishedEvent[] = [];

  /** Subscribers by event type */
  private readonly _typeSubscribers = new Map<string, Set<EventHandler>>();

  /** Subscribers to every event */
  private readonly _globalSubscribers = new Set<EventHandler>();

  // ─── Publish ────────────────────────────────────────────────────────

  /**
   * Record the event, then run every matching handler. Rejects with
   * HANDLER_FAILED if any handler throws; the event stays in the log.
   */
  async publish(event: DomainEvent): Promise<void> {
    const published: PublishedEvent = Object.freeze({
      event,
      position: this._log.length + 1,
      publishedAt: new Date().toISOString(),
    });
    this._log.push(published);

    const results = await Promise.allSettled(
      this._handlersFor(event.type).map(async (handler) => handler(published)),
    );

    const failures = results.filter(
      (r): r is PromiseRejectedResult => r.status === "rejected",
    );
    if (failures.length > 0) {
      const reasons = failures.map((f) =>
        f.reason instanceof Error ? f.reason.message : String(f.reason),
      );
      throw new EventPublishError(
        "HANDLER_FAILED",
        `${failures.length} handler(s) failed for "${event.type}": ${reasons.join("; ")}`,
        event.type,
      );
    }
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(type: string, handler: EventHandler): Subscription {
    let subscribers = this._typeSubscribers.get(type);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._typeSubscribers.set(type, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._typeSubscribers.delete(type);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  /**
   * Published events in order, optionally restricted to one type.
   */
  events(type?: string): readonly PublishedEvent[] {
    if (type === undefined) {
      return [...this._log];
    }
    return this._log.filter((p) => p.event.type === type);
  }

  get size(): number {
    return this._log.length;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _handlersFor(type: string): EventHandler[] {
    const typed = this._typeSubscribers.get(type);
    return [...(typed ?? []), ...this._globalSubscribers];
  }
}
