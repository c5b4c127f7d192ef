/**
 * @ordergrid/events: Core types.
 *
 * Defines the outbound event port the domain publishes through, and the
 * subscription surface of the in-process bus.
 *
 * Design principles:
 * - Publishing is at-most-once: no retries, no outbox
 * - A failed publish rejects; the caller decides whether that matters
 * - Events are immutable once published
 */

import type { DomainEvent } from "@ordergrid/types";

// =============================================================================
// Publisher Port
// =============================================================================

/**
 * Destination for domain events.
 */
export interface EventPublisher {
  publish(event: DomainEvent): Promise<void>;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * An event as recorded by the in-memory bus.
 */
export interface PublishedEvent {
  readonly event: DomainEvent;

  /** Position in the bus log (1-based, monotonically increasing) */
  readonly position: number;

  /** When the bus accepted the event */
  readonly publishedAt: string;
}

export type EventHandler = (published: PublishedEvent) => void | Promise<void>;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Errors
// =============================================================================

export type EventPublishErrorCode =
  | "TIMEOUT"
  | "HTTP_ERROR"
  | "NETWORK_ERROR"
  | "HANDLER_FAILED";

/**
 * Error thrown when an event could not be delivered.
 */
export class EventPublishError extends Error {
  constructor(
    public readonly code: EventPublishErrorCode,
    message: string,
    public readonly eventType?: string,
  ) {
    super(message);
    this.name = "EventPublishError";
  }
}
