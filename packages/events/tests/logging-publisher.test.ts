/**
 * Logging Publisher Tests
 *
 * Verifies:
 * - One debug line per event
 * - Nothing logged above the configured level
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { DomainEvent } from "@ordergrid/types";
import { LoggingEventPublisher } from "../src/logging-publisher.js";

const EVENT: DomainEvent = {
  type: "order.updated",
  metadata: {
    eventId: "evt-7",
    timestamp: "2025-01-01T00:00:00.000Z",
    correlationId: "o-1",
    source: "orders",
  },
  payload: { order_id: "o-1" },
};

function publisherAt(level: string): {
  publisher: LoggingEventPublisher;
  lines: Array<Record<string, unknown>>;
} {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  );
  return { publisher: new LoggingEventPublisher(logger), lines };
}

describe("LoggingEventPublisher", () => {
  it("logs each event at debug", async () => {
    const { publisher, lines } = publisherAt("debug");

    await publisher.publish(EVENT);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "Event published",
      eventType: "order.updated",
      eventId: "evt-7",
      correlationId: "o-1",
    });
  });

  it("writes nothing at info", async () => {
    const { publisher, lines } = publisherAt("info");

    await publisher.publish(EVENT);
    await publisher.publish(EVENT);

    expect(lines).toEqual([]);
  });
});
