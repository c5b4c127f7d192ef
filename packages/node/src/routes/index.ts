/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes, SERVICE_VERSION, ENTITY_COLLECTIONS } from "./health.js";
export { createOrderRoutes, PROCESSING_STARTED_MESSAGE } from "./orders.js";
export { createPaymentRoutes } from "./payments.js";
export { createOrderDetailRoutes } from "./order-details.js";
export { createTaskRoutes } from "./tasks.js";
