/**
 * OrderService: Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never construct stores
 * or task machinery themselves. One instance per app: every route sees
 * the same collections, so reads always observe earlier writes.
 */

import type { Logger } from "pino";
import type { EventPublisher } from "@ordergrid/events";
import { LoggingEventPublisher } from "@ordergrid/events";
import { MonotonicClock } from "@ordergrid/store";
import type { Clock } from "@ordergrid/store";
import {
  EventNotifier,
  TaskManager,
  TaskRegistry,
  createOrderDetailStore,
  createOrderStore,
  createPaymentStore,
  simulatedPhases,
} from "@ordergrid/orders";
import type {
  OrderDetailStore,
  OrderStore,
  PaymentStore,
  ProcessingPhase,
} from "@ordergrid/orders";

// =============================================================================
// Configuration
// =============================================================================

export interface OrderServiceConfig {
  readonly logger: Logger;
  /** Destination of order events. Default: debug log lines only */
  readonly publisher?: EventPublisher | undefined;
  /** Maximum background tasks processed at once. Default: 4 */
  readonly taskConcurrency?: number | undefined;
  /** Simulated delay per processing phase. Default: 2000 ms */
  readonly phaseDelayMs?: number | undefined;
  /** Replaces the simulated phases entirely */
  readonly phases?: readonly ProcessingPhase[] | undefined;
  readonly clock?: Clock | undefined;
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class OrderService {
  readonly orders: OrderStore;
  readonly payments: PaymentStore;
  readonly orderDetails: OrderDetailStore;
  readonly tasks: TaskManager;
  readonly notifier: EventNotifier;
  readonly publisher: EventPublisher;

  private _stopped = false;

  constructor(config: OrderServiceConfig) {
    const clock = config.clock ?? new MonotonicClock();
    const storeOptions = { clock, generateId: config.generateId };

    const eventLogger = config.logger.child({ component: "events" });
    this.publisher = config.publisher ?? new LoggingEventPublisher(eventLogger);
    this.notifier = new EventNotifier({
      publisher: this.publisher,
      logger: eventLogger,
    });

    this.orders = createOrderStore({
      ...storeOptions,
      onCommit: this.notifier.onOrderCommitted,
    });
    this.payments = createPaymentStore(storeOptions);
    this.orderDetails = createOrderDetailStore(storeOptions);

    this.tasks = new TaskManager({
      orders: this.orders,
      logger: config.logger.child({ component: "tasks" }),
      registry: new TaskRegistry({ clock, generateId: config.generateId }),
      phases: config.phases ?? simulatedPhases({ delayMs: config.phaseDelayMs }),
      concurrency: config.taskConcurrency,
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return !this._stopped;
  }

  /**
   * Stop accepting tasks, wait for running ones, then for the events
   * they emitted.
   */
  async stop(): Promise<void> {
    this._stopped = true;
    await this.tasks.stop();
    await this.notifier.flush();
  }
}
