/**
 * Event Types
 *
 * Outbound notifications emitted after a successful write. Delivery is
 * best-effort: at most once, never retried, never allowed to fail the write.
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** ID for grouping related events across systems (the id of the changed entity) */
  readonly correlationId: string;

  /** Which collection emitted this event */
  readonly source: EventSource;
}

export type EventSource = "orders" | "payments" | "order-details" | "tasks";

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent<TPayload = Readonly<Record<string, unknown>>> {
  /** Event type identifier (e.g., "order.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  readonly payload: TPayload;
}

export type OrderEventType = "order.created" | "order.updated";
