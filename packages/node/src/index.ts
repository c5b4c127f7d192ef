/**
 * @ordergrid/node: HTTP surface for orders, payments and order details.
 *
 * @packageDocumentation
 */

export { OrderService } from "./services/order-service.js";
export type { OrderServiceConfig } from "./services/order-service.js";
export {
  loadConfig,
  parseApiKeys,
  toAuthConfig,
  createEventPublisher,
  ConfigSchema,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
