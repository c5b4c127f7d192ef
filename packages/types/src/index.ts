/**
 * @ordergrid/types: Shared domain types for the OrderGrid stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Field names match the wire format (snake_case)
 * - No runtime dependencies
 */

// Entity types
export type { OrderRecord, Order, OrderInput, OrderPatch } from "./order.js";
export { DEFAULT_ORDER_STATUS } from "./order.js";
export type {
  PaymentRecord,
  Payment,
  PaymentInput,
  PaymentPatch,
} from "./payment.js";
export type {
  OrderDetailKey,
  OrderDetailRecord,
  OrderDetail,
  OrderDetailInput,
  OrderDetailPatch,
} from "./order-detail.js";

// Links
export type {
  ResourceLinks,
  OrderLinks,
  PaymentLinks,
  OrderDetailLinks,
  TaskLinks,
} from "./links.js";

// Task types
export type {
  TaskStatus,
  Task,
  TaskView,
  TaskAccepted,
  OrderTaskResult,
} from "./task.js";
export { TERMINAL_TASK_STATUSES } from "./task.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  OrderEventType,
} from "./event.js";

// Runtime type guards
export {
  isResourceLinks,
  isOrderRecord,
  isPaymentRecord,
  isOrderDetailRecord,
  isTaskStatus,
  isTerminalTaskStatus,
  isTask,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
