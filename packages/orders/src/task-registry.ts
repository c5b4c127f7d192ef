/**
 * Task Registry: Lifecycle state of background tasks.
 *
 *   pending → processing → completed
 *          ↘            ↘ failed
 *            failed
 *
 * Rules:
 * - Only valid transitions are allowed
 * - Terminal states (completed, failed) are final
 * - Snapshots are frozen and replaced wholesale, never mutated
 * - result is set only by completion, error only by failure
 */

import { randomUUID } from "node:crypto";
import { MonotonicClock } from "@ordergrid/store";
import type { Clock } from "@ordergrid/store";
import type { OrderTaskResult, Task, TaskStatus } from "@ordergrid/types";

// =============================================================================
// Error
// =============================================================================

export class TaskError extends Error {
  public readonly code: TaskErrorCode;
  constructor(code: TaskErrorCode, message: string) {
    super(message);
    this.name = "TaskError";
    this.code = code;
  }
}

export type TaskErrorCode =
  | "TASK_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "QUEUE_STOPPED";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing", "failed"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

// =============================================================================
// Task Registry
// =============================================================================

export interface TaskRegistryOptions {
  readonly clock?: Clock | undefined;
  readonly generateId?: (() => string) | undefined;
}

export class TaskRegistry {
  private readonly tasks: Map<string, Task> = new Map();
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(options: TaskRegistryOptions = {}) {
    this.clock = options.clock ?? new MonotonicClock();
    this.generateId = options.generateId ?? randomUUID;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a new task in `pending`.
   */
  register(): Task {
    const now = this.clock.now();
    const task: Task = {
      task_id: this.generateId(),
      status: "pending",
      created_at: now,
      updated_at: now,
      result: null,
      error: null,
    };
    Object.freeze(task);
    this.tasks.set(task.task_id, task);
    return task;
  }

  markProcessing(taskId: string): Task {
    return this.transition(taskId, "processing", {});
  }

  complete(taskId: string, result: OrderTaskResult): Task {
    return this.transition(taskId, "completed", { result });
  }

  fail(taskId: string, error: string): Task {
    return this.transition(taskId, "failed", { error });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  require(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (task === undefined) {
      throw new TaskError("TASK_NOT_FOUND", `Task '${taskId}' not found`);
    }
    return task;
  }

  list(status?: TaskStatus): readonly Task[] {
    const all = [...this.tasks.values()];
    return status === undefined ? all : all.filter((t) => t.status === status);
  }

  get size(): number {
    return this.tasks.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private transition(
    taskId: string,
    to: TaskStatus,
    outcome: { readonly result?: OrderTaskResult; readonly error?: string },
  ): Task {
    const task = this.require(taskId);
    const allowed = VALID_TRANSITIONS[task.status];
    if (!allowed.includes(to)) {
      throw new TaskError(
        "INVALID_TRANSITION",
        `Cannot transition task '${taskId}' from '${task.status}' to '${to}'`,
      );
    }

    const updated: Task = {
      ...task,
      status: to,
      updated_at: this.clock.now(),
      result: outcome.result ?? null,
      error: outcome.error ?? null,
    };
    Object.freeze(updated);

    this.tasks.set(taskId, updated);
    return updated;
  }
}
