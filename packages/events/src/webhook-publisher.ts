/**
 * @ordergrid/events: Webhook publisher.
 *
 * POSTs each event as JSON to a single endpoint. One attempt per event:
 * a timeout, a network failure or a non-2xx response rejects with an
 * EventPublishError and the event is not retried.
 */

import type { DomainEvent } from "@ordergrid/types";
import type { EventPublisher } from "./types.js";
import { EventPublishError } from "./types.js";

export interface WebhookPublisherConfig {
  /** Absolute URL the events are POSTed to */
  readonly url: string;
  /** Request timeout in milliseconds. Default: 5000 */
  readonly timeoutMs?: number | undefined;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

export class WebhookEventPublisher implements EventPublisher {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: WebhookPublisherConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async publish(event: DomainEvent): Promise<void> {
    const response = await this.fetchWithTimeout(event);
    // The body is never read; release the connection
    await response.body?.cancel();

    if (!response.ok) {
      throw new EventPublishError(
        "HTTP_ERROR",
        `Webhook responded with HTTP ${response.status}`,
        event.type,
      );
    }
  }

  private async fetchWithTimeout(event: DomainEvent): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Event-Type": event.type,
          "X-Event-Id": event.metadata.eventId,
        },
        body: JSON.stringify(event),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new EventPublishError(
          "TIMEOUT",
          `Webhook timed out after ${this.timeoutMs}ms`,
          event.type,
        );
      }
      throw new EventPublishError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
        event.type,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
