/**
 * Order Types
 *
 * An order belongs to a user (opaque id owned by another service) and has a
 * free-form status. Identity and timestamps are server-assigned.
 *
 * Rules:
 * - `order_id` and `created_at` never change after creation
 * - `total_price` is never negative
 * - `updated_at` moves forward on every write
 */

import type { OrderLinks, ResourceLinks } from "./links.js";

/**
 * Order as held by the store. `links` may be missing or empty; it is
 * regenerated before the record leaves the store.
 */
export interface OrderRecord {
  readonly order_id: string;
  readonly user_id: string;
  /** ISO 8601 timestamp of when the order was placed */
  readonly order_date: string;
  readonly total_price: number;
  readonly status: string;
  readonly created_at: string;
  readonly updated_at: string;
  readonly links?: ResourceLinks;
}

/**
 * Order as returned to callers.
 */
export interface Order extends OrderRecord {
  readonly links: OrderLinks;
}

export interface OrderInput {
  readonly user_id: string;
  readonly total_price: number;
  readonly status?: string | undefined;
  readonly order_date?: string | undefined;
}

export interface OrderPatch {
  readonly user_id?: string | undefined;
  readonly order_date?: string | undefined;
  readonly total_price?: number | undefined;
  readonly status?: string | undefined;
}

export const DEFAULT_ORDER_STATUS = "pending";
