/**
 * Runtime Type Guards
 *
 * Narrowing functions for OrderGrid domain types.
 * Used at system boundaries (deserialized events, webhook payloads,
 * API clients reading our own responses).
 */

import type { OrderRecord } from "./order.js";
import type { PaymentRecord } from "./payment.js";
import type { OrderDetailRecord } from "./order-detail.js";
import type { Task, TaskStatus } from "./task.js";
import { TERMINAL_TASK_STATUSES } from "./task.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { ResourceLinks } from "./links.js";

function isTimestamp(value: unknown): value is string {
  return typeof value === "string" && !Number.isNaN(Date.parse(value));
}

function isNonNegative(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

// =============================================================================
// Link guards
// =============================================================================

export function isResourceLinks(value: unknown): value is ResourceLinks {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

// =============================================================================
// Entity guards
// =============================================================================

export function isOrderRecord(value: unknown): value is OrderRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.order_id === "string" &&
    typeof v.user_id === "string" &&
    isTimestamp(v.order_date) &&
    isNonNegative(v.total_price) &&
    typeof v.status === "string" &&
    isTimestamp(v.created_at) &&
    isTimestamp(v.updated_at) &&
    (v.links === undefined || isResourceLinks(v.links))
  );
}

export function isPaymentRecord(value: unknown): value is PaymentRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.payment_id === "string" &&
    typeof v.order_id === "string" &&
    typeof v.payment_method === "string" &&
    isTimestamp(v.payment_date) &&
    isNonNegative(v.amount) &&
    isTimestamp(v.created_at) &&
    isTimestamp(v.updated_at) &&
    (v.links === undefined || isResourceLinks(v.links))
  );
}

export function isOrderDetailRecord(value: unknown): value is OrderDetailRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.order_id === "string" &&
    typeof v.prod_id === "string" &&
    typeof v.quantity === "number" &&
    Number.isInteger(v.quantity) &&
    v.quantity >= 1 &&
    isNonNegative(v.subtotal) &&
    isTimestamp(v.created_at) &&
    isTimestamp(v.updated_at) &&
    (v.links === undefined || isResourceLinks(v.links))
  );
}

// =============================================================================
// Task guards
// =============================================================================

const TASK_STATUSES = new Set<string>(["pending", "processing", "completed", "failed"]);

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === "string" && TASK_STATUSES.has(value);
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export function isTask(value: unknown): value is Task {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.task_id === "string" &&
    isTaskStatus(v.status) &&
    isTimestamp(v.created_at) &&
    isTimestamp(v.updated_at) &&
    typeof v.result === "object" &&
    (v.error === null || typeof v.error === "string")
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["orders", "payments", "order-details", "tasks"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
