/**
 * Task Types
 *
 * A task is a handle to deferred background work with a pollable outcome.
 *
 *   pending → processing → completed
 *                        ↘ failed
 *
 * Terminal states are final: a completed or failed task never changes again.
 */

import type { Order } from "./order.js";
import type { TaskLinks } from "./links.js";

export type TaskStatus = "pending" | "processing" | "completed" | "failed";

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ["completed", "failed"];

/**
 * Outcome of a completed order-processing task.
 */
export interface OrderTaskResult {
  readonly order_id: string;
  readonly order: Order;
}

export interface Task {
  readonly task_id: string;
  readonly status: TaskStatus;
  readonly created_at: string;
  readonly updated_at: string;
  /** Present only once completed */
  readonly result: OrderTaskResult | null;
  /** Present only once failed */
  readonly error: string | null;
}

/**
 * Task snapshot as returned by the status endpoint.
 */
export interface TaskView extends Task {
  readonly links: TaskLinks;
}

/**
 * Body of the 202 Accepted response that starts a task.
 */
export interface TaskAccepted {
  readonly task_id: string;
  readonly status_url: string;
  readonly message: string;
  readonly links: TaskLinks;
}
