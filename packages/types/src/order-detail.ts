/**
 * Order Detail Types
 *
 * A line item of an order. The only entity keyed by a composite of two
 * foreign references (order_id, prod_id) instead of a synthetic id.
 */

import type { OrderDetailLinks, ResourceLinks } from "./links.js";

export interface OrderDetailKey {
  readonly order_id: string;
  readonly prod_id: string;
}

export interface OrderDetailRecord extends OrderDetailKey {
  /** Integer, at least 1 */
  readonly quantity: number;
  readonly subtotal: number;
  readonly created_at: string;
  readonly updated_at: string;
  readonly links?: ResourceLinks;
}

export interface OrderDetail extends OrderDetailRecord {
  readonly links: OrderDetailLinks;
}

export interface OrderDetailInput extends OrderDetailKey {
  readonly quantity: number;
  readonly subtotal: number;
}

export interface OrderDetailPatch {
  readonly quantity?: number | undefined;
  readonly subtotal?: number | undefined;
}
