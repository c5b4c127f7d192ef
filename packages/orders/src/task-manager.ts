/**
 * TaskManager: Asynchronous order creation.
 *
 * `start` registers a pending task and queues the work; the caller gets
 * the task id back immediately and polls `getStatus`. The worker moves
 * the task to processing, runs the processing phases, creates the order
 * and records exactly one terminal outcome. Failures are recorded on the
 * task and never reach the caller of `start`.
 */

import type { Logger } from "pino";
import type { OrderInput, TaskView } from "@ordergrid/types";
import { taskStatusPath } from "./links.js";
import { toOrderRepresentation, toTaskView } from "./representations.js";
import type { OrderStore } from "./stores.js";
import type { ProcessingPhase } from "./processing.js";
import { simulatedPhases } from "./processing.js";
import { TaskQueue } from "./task-queue.js";
import { TaskError, TaskRegistry } from "./task-registry.js";

export interface TaskManagerOptions {
  readonly orders: OrderStore;
  readonly logger: Logger;
  readonly registry?: TaskRegistry | undefined;
  /** Default: validation, inventory and payment with a 2000 ms delay each */
  readonly phases?: readonly ProcessingPhase[] | undefined;
  /** Maximum tasks processed at once. Default: 4 */
  readonly concurrency?: number | undefined;
}

export interface StartedTask {
  readonly task_id: string;
  readonly status_url: string;
}

export class TaskManager {
  private readonly orders: OrderStore;
  private readonly logger: Logger;
  private readonly registry: TaskRegistry;
  private readonly phases: readonly ProcessingPhase[];
  private readonly queue: TaskQueue;

  constructor(options: TaskManagerOptions) {
    this.orders = options.orders;
    this.logger = options.logger;
    this.registry = options.registry ?? new TaskRegistry();
    this.phases = options.phases ?? simulatedPhases();
    this.queue = new TaskQueue({
      concurrency: options.concurrency,
      onError: (err) => {
        this.logger.error(
          { err: err instanceof Error ? err.message : String(err) },
          "Task worker crashed",
        );
      },
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a pending task and queue its work. Returns without waiting.
   */
  start(input: OrderInput): StartedTask {
    if (!this.queue.isAccepting) {
      throw new TaskError("QUEUE_STOPPED", "Task queue is stopped");
    }

    const task = this.registry.register();
    this.queue.add(() => this.process(task.task_id, input));
    this.logger.debug({ taskId: task.task_id }, "Task queued");

    return {
      task_id: task.task_id,
      status_url: taskStatusPath(task.task_id),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getStatus(taskId: string): TaskView {
    return toTaskView(this.registry.require(taskId));
  }

  /**
   * Resolves when no task is running or waiting.
   */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /**
   * Stop accepting tasks and wait for queued ones to finish.
   */
  stop(): Promise<void> {
    return this.queue.stop();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Worker
  // ───────────────────────────────────────────────────────────────────────

  private async process(taskId: string, input: OrderInput): Promise<void> {
    this.registry.markProcessing(taskId);
    const log = this.logger.child({ taskId });
    log.debug("Task processing");

    let phase = "create";
    try {
      for (const p of this.phases) {
        phase = p.name;
        await p.run(input);
      }
      phase = "create";

      const order = toOrderRepresentation(await this.orders.create(input));
      this.registry.complete(taskId, { order_id: order.order_id, order });
      log.info({ orderId: order.order_id }, "Task completed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.registry.fail(taskId, message);
      log.warn({ phase, err: message }, "Task failed");
    }
  }
}
