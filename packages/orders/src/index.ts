/**
 * @ordergrid/orders: Order, payment and order-detail domain.
 *
 * Provides:
 * - Entity definitions and store factories for the three collections
 * - Link Generator and canonical representations
 * - EventNotifier: fire-and-forget order change events
 * - TaskManager: asynchronous order creation behind a pollable task
 *
 * @packageDocumentation
 */

// Links and representations
export {
  orderLinks,
  paymentLinks,
  orderDetailLinks,
  taskLinks,
  taskStatusPath,
} from "./links.js";
export {
  toOrderRepresentation,
  toPaymentRepresentation,
  toOrderDetailRepresentation,
  toTaskView,
} from "./representations.js";

// Collections
export {
  orderDefinition,
  paymentDefinition,
  orderDetailDefinition,
  encodeOrderDetailKey,
} from "./definitions.js";
export {
  createOrderStore,
  createPaymentStore,
  createOrderDetailStore,
} from "./stores.js";
export type { OrderStore, PaymentStore, OrderDetailStore } from "./stores.js";

// Events
export { EventNotifier } from "./event-notifier.js";
export type { EventNotifierOptions } from "./event-notifier.js";

// Tasks
export { TaskRegistry, TaskError } from "./task-registry.js";
export type { TaskErrorCode, TaskRegistryOptions } from "./task-registry.js";
export { TaskQueue } from "./task-queue.js";
export type { Job, TaskQueueOptions } from "./task-queue.js";
export {
  simulatedPhases,
  realSleep,
  DEFAULT_PHASE_NAMES,
  DEFAULT_PHASE_DELAY_MS,
} from "./processing.js";
export type { ProcessingPhase, Sleep, SimulatedPhaseOptions } from "./processing.js";
export { TaskManager } from "./task-manager.js";
export type { TaskManagerOptions, StartedTask } from "./task-manager.js";
