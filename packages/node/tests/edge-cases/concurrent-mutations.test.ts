/**
 * Tests for concurrent mutation edge cases.
 *
 * Conditional updates on the same entity are serialized, so two writers
 * holding the same ETag cannot both win.
 */

import { describe, it, expect } from "vitest";
import type { Order } from "@ordergrid/types";
import { createTestApp, jsonRequest, orderBody } from "../setup.js";

describe("concurrent mutations", () => {
  it("two concurrent updates with the same If-Match: one wins, one gets 412", async () => {
    const { app } = createTestApp();
    const created = await app.request(jsonRequest("/orders", "POST", orderBody()));
    const order = (await created.json()) as Order;
    const etag = created.headers.get("ETag") ?? "";

    const [res1, res2] = await Promise.all([
      app.request(
        jsonRequest(`/orders/${order.order_id}`, "PUT", { status: "shipped" }, { "If-Match": etag }),
      ),
      app.request(
        jsonRequest(`/orders/${order.order_id}`, "PUT", { status: "cancelled" }, { "If-Match": etag }),
      ),
    ]);

    expect([res1.status, res2.status].sort()).toEqual([200, 412]);

    const winner = res1.status === 200 ? res1 : res2;
    const final = await app.request(`/orders/${order.order_id}`);
    expect(await final.json()).toEqual(await winner.json());
  });

  it("concurrent creates all succeed with distinct ids", async () => {
    const { app } = createTestApp();

    const responses = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        app.request(jsonRequest("/orders", "POST", orderBody({ total_price: i }))),
      ),
    );

    expect(responses.every((r) => r.status === 201)).toBe(true);
    const ids = await Promise.all(
      responses.map(async (r) => ((await r.json()) as Order).order_id),
    );
    expect(new Set(ids).size).toBe(10);

    const list = await app.request("/orders");
    expect((await list.json()) as Order[]).toHaveLength(10);
    expect(list.headers.get("X-Total-Count")).toBe("10");
  });

  it("an update serialized after another sees the new ETag", async () => {
    const { app } = createTestApp();
    const created = await app.request(jsonRequest("/orders", "POST", orderBody()));
    const order = (await created.json()) as Order;
    const e1 = created.headers.get("ETag") ?? "";

    const first = await app.request(
      jsonRequest(`/orders/${order.order_id}`, "PUT", { status: "shipped" }, { "If-Match": e1 }),
    );
    const e2 = first.headers.get("ETag") ?? "";

    const second = await app.request(
      jsonRequest(`/orders/${order.order_id}`, "PUT", { status: "delivered" }, { "If-Match": e2 }),
    );

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(((await second.json()) as Order).status).toBe("delivered");
  });
});
