/**
 * @ordergrid/events: Log-only publisher.
 *
 * Writes each event to the logger at debug and keeps nothing. Used when
 * no webhook is configured, so events leave a trace without the process
 * holding on to them.
 */

import type { Logger } from "pino";
import type { DomainEvent } from "@ordergrid/types";
import type { EventPublisher } from "./types.js";

export class LoggingEventPublisher implements EventPublisher {
  constructor(private readonly logger: Logger) {}

  async publish(event: DomainEvent): Promise<void> {
    this.logger.debug(
      {
        eventType: event.type,
        eventId: event.metadata.eventId,
        correlationId: event.metadata.correlationId,
      },
      "Event published",
    );
  }
}
