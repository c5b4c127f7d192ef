/**
 * Runtime type guard tests for @ordergrid/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isResourceLinks,
  isOrderRecord,
  isPaymentRecord,
  isOrderDetailRecord,
  isTaskStatus,
  isTerminalTaskStatus,
  isTask,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

const NOW = "2025-01-16T10:20:30.000Z";

// =============================================================================
// Link guards
// =============================================================================

describe("isResourceLinks", () => {
  it("accepts a string → string mapping", () => {
    expect(isResourceLinks({ self: "/orders/1" })).toBe(true);
  });

  it("accepts an empty mapping", () => {
    expect(isResourceLinks({})).toBe(true);
  });

  it("rejects non-string values", () => {
    expect(isResourceLinks({ self: 1 })).toBe(false);
  });

  it("rejects arrays and null", () => {
    expect(isResourceLinks(["/orders/1"])).toBe(false);
    expect(isResourceLinks(null)).toBe(false);
  });
});

// =============================================================================
// Entity guards
// =============================================================================

describe("isOrderRecord", () => {
  const order = {
    order_id: "o-1",
    user_id: "u-1",
    order_date: NOW,
    total_price: 100,
    status: "pending",
    created_at: NOW,
    updated_at: NOW,
  };

  it("accepts a valid order without links", () => {
    expect(isOrderRecord(order)).toBe(true);
  });

  it("accepts a valid order with links", () => {
    expect(isOrderRecord({ ...order, links: { self: "/orders/o-1" } })).toBe(true);
  });

  it("accepts a zero total price", () => {
    expect(isOrderRecord({ ...order, total_price: 0 })).toBe(true);
  });

  it("rejects a negative total price", () => {
    expect(isOrderRecord({ ...order, total_price: -1 })).toBe(false);
  });

  it("rejects a string total price", () => {
    expect(isOrderRecord({ ...order, total_price: "100" })).toBe(false);
  });

  it("rejects an unparseable order date", () => {
    expect(isOrderRecord({ ...order, order_date: "yesterday" })).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isOrderRecord(null)).toBe(false);
    expect(isOrderRecord("o-1")).toBe(false);
  });
});

describe("isPaymentRecord", () => {
  const payment = {
    payment_id: "p-1",
    order_id: "o-1",
    payment_method: "credit_card",
    payment_date: NOW,
    amount: 19.99,
    created_at: NOW,
    updated_at: NOW,
  };

  it("accepts a valid payment", () => {
    expect(isPaymentRecord(payment)).toBe(true);
  });

  it("rejects a missing payment method", () => {
    const { payment_method: _omitted, ...rest } = payment;
    expect(isPaymentRecord(rest)).toBe(false);
  });

  it("rejects a negative amount", () => {
    expect(isPaymentRecord({ ...payment, amount: -0.01 })).toBe(false);
  });
});

describe("isOrderDetailRecord", () => {
  const detail = {
    order_id: "o-1",
    prod_id: "prod-1",
    quantity: 2,
    subtotal: 39.98,
    created_at: NOW,
    updated_at: NOW,
  };

  it("accepts a valid order detail", () => {
    expect(isOrderDetailRecord(detail)).toBe(true);
  });

  it("rejects zero quantity", () => {
    expect(isOrderDetailRecord({ ...detail, quantity: 0 })).toBe(false);
  });

  it("rejects fractional quantity", () => {
    expect(isOrderDetailRecord({ ...detail, quantity: 1.5 })).toBe(false);
  });

  it("rejects links with non-string values", () => {
    expect(isOrderDetailRecord({ ...detail, links: { self: 42 } })).toBe(false);
  });
});

// =============================================================================
// Task guards
// =============================================================================

describe("isTaskStatus", () => {
  it("accepts all lifecycle states", () => {
    for (const s of ["pending", "processing", "completed", "failed"]) {
      expect(isTaskStatus(s)).toBe(true);
    }
  });

  it("rejects unknown states", () => {
    expect(isTaskStatus("cancelled")).toBe(false);
    expect(isTaskStatus(1)).toBe(false);
  });
});

describe("isTerminalTaskStatus", () => {
  it("treats completed and failed as terminal", () => {
    expect(isTerminalTaskStatus("completed")).toBe(true);
    expect(isTerminalTaskStatus("failed")).toBe(true);
  });

  it("treats pending and processing as non-terminal", () => {
    expect(isTerminalTaskStatus("pending")).toBe(false);
    expect(isTerminalTaskStatus("processing")).toBe(false);
  });
});

describe("isTask", () => {
  const task = {
    task_id: "t-1",
    status: "pending",
    created_at: NOW,
    updated_at: NOW,
    result: null,
    error: null,
  };

  it("accepts a pending task", () => {
    expect(isTask(task)).toBe(true);
  });

  it("accepts a failed task with an error message", () => {
    expect(isTask({ ...task, status: "failed", error: "boom" })).toBe(true);
  });

  it("rejects an undefined result", () => {
    expect(isTask({ ...task, result: undefined })).toBe(false);
  });

  it("rejects an unknown status", () => {
    expect(isTask({ ...task, status: "queued" })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: NOW,
    correlationId: "req-1",
    source: "orders",
  };

  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "billing" })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "order.created",
        metadata: {
          eventId: "evt-1",
          timestamp: NOW,
          correlationId: "req-1",
          source: "orders",
        },
        payload: { order_id: "o-1" },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({
        type: "order.created",
        metadata: {
          eventId: "evt-1",
          timestamp: NOW,
          correlationId: "req-1",
          source: "orders",
        },
        payload: null,
      }),
    ).toBe(false);
  });
});
