/**
 * @ordergrid/events: Outbound domain events.
 *
 * Provides:
 * - EventPublisher port
 * - InMemoryEventBus: ordered log with type and global subscriptions
 * - WebhookEventPublisher: single-attempt JSON POST with timeout
 * - LoggingEventPublisher: debug log line per event, nothing retained
 *
 * @packageDocumentation
 */

export type {
  EventPublisher,
  PublishedEvent,
  EventHandler,
  Subscription,
  EventPublishErrorCode,
} from "./types.js";
export { EventPublishError } from "./types.js";

export { InMemoryEventBus } from "./in-memory-bus.js";
export { WebhookEventPublisher } from "./webhook-publisher.js";
export { LoggingEventPublisher } from "./logging-publisher.js";
export type { WebhookPublisherConfig } from "./webhook-publisher.js";
