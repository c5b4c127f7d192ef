/**
 * EventNotifier: Order change notifications.
 *
 * Turns committed order writes into `order.created` / `order.updated`
 * events and hands them to the configured publisher. Delivery is
 * fire-and-forget: the write has already committed, so a failed publish
 * (rejected or thrown) is logged at warn and goes no further.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { EventPublisher } from "@ordergrid/events";
import type { StoreChange } from "@ordergrid/store";
import type { DomainEvent, Order, OrderEventType } from "@ordergrid/types";
import { toOrderRepresentation } from "./representations.js";

export interface EventNotifierOptions {
  readonly publisher: EventPublisher;
  readonly logger: Logger;
  readonly generateId?: (() => string) | undefined;
  readonly now?: (() => string) | undefined;
}

export class EventNotifier {
  private readonly publisher: EventPublisher;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => string;

  /** Deliveries that have not settled yet */
  private readonly pending = new Set<Promise<void>>();

  constructor(options: EventNotifierOptions) {
    this.publisher = options.publisher;
    this.logger = options.logger;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * Commit listener for the order store.
   */
  readonly onOrderCommitted = (change: StoreChange<Order>): void => {
    const type: OrderEventType =
      change.kind === "created" ? "order.created" : "order.updated";
    const order = toOrderRepresentation(change.entity);

    this.notify({
      type,
      metadata: {
        eventId: this.generateId(),
        timestamp: this.now(),
        correlationId: order.order_id,
        source: "orders",
      },
      payload: { order_id: order.order_id, order },
    });
  };

  /**
   * Publish without waiting. Never throws.
   */
  notify(event: DomainEvent): void {
    const delivery = Promise.resolve()
      .then(() => this.publisher.publish(event))
      .catch((err: unknown) => {
        this.logger.warn(
          {
            eventType: event.type,
            eventId: event.metadata.eventId,
            err: err instanceof Error ? err.message : String(err),
          },
          "Event publication failed",
        );
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /**
   * Resolves once every delivery started so far has settled.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
