/**
 * Entity definitions for the three collections.
 *
 * Each definition tells EntityStore how to key, build, patch and link a
 * record, and which fields list queries may filter and sort on.
 */

import type { EntityDefinition, FieldSpec } from "@ordergrid/store";
import type {
  OrderDetailInput,
  OrderDetailKey,
  OrderDetailLinks,
  OrderDetailPatch,
  OrderDetailRecord,
  OrderInput,
  OrderLinks,
  OrderPatch,
  OrderRecord,
  PaymentInput,
  PaymentLinks,
  PaymentPatch,
  PaymentRecord,
} from "@ordergrid/types";
import { DEFAULT_ORDER_STATUS } from "@ordergrid/types";
import { orderDetailLinks, orderLinks, paymentLinks } from "./links.js";

// =============================================================================
// Shared
// =============================================================================

function timestampFields<T extends { created_at: string; updated_at: string }>(): Record<
  "created_at" | "updated_at",
  FieldSpec<T>
> {
  return {
    created_at: { kind: "date", get: (r) => r.created_at },
    updated_at: { kind: "date", get: (r) => r.updated_at },
  };
}

/**
 * Copy the defined keys of `patch` over `record`.
 */
function overwrite<TRecord extends object, TPatch extends object>(
  record: TRecord,
  patch: TPatch,
  keys: readonly (keyof TPatch & keyof TRecord)[],
): TRecord {
  let next = record;
  for (const key of keys) {
    const value = patch[key];
    if (value !== undefined) {
      next = { ...next, [key]: value };
    }
  }
  return next;
}

// =============================================================================
// Order
// =============================================================================

export const orderDefinition: EntityDefinition<
  OrderRecord,
  OrderLinks,
  string,
  OrderInput,
  OrderPatch
> = {
  label: "Order",
  keyOf: (r) => r.order_id,
  encodeKey: (id) => id,
  create: (input, ctx) => ({
    order_id: ctx.id,
    user_id: input.user_id,
    order_date: input.order_date ?? ctx.now,
    total_price: input.total_price,
    status: input.status ?? DEFAULT_ORDER_STATUS,
    created_at: ctx.now,
    updated_at: ctx.now,
  }),
  applyPatch: (r, patch) =>
    overwrite(r, patch, ["user_id", "order_date", "total_price", "status"]),
  links: orderLinks,
  fields: {
    user_id: { kind: "string", get: (r) => r.user_id },
    status: { kind: "string", get: (r) => r.status },
    total_price: { kind: "number", get: (r) => r.total_price },
    order_date: { kind: "date", get: (r) => r.order_date },
    ...timestampFields<OrderRecord>(),
  },
  equalityFields: ["user_id", "status"],
  rangeFields: ["total_price", "order_date"],
  sortFields: ["order_date", "total_price", "status", "user_id", "created_at", "updated_at"],
};

// =============================================================================
// Payment
// =============================================================================

export const paymentDefinition: EntityDefinition<
  PaymentRecord,
  PaymentLinks,
  string,
  PaymentInput,
  PaymentPatch
> = {
  label: "Payment",
  keyOf: (r) => r.payment_id,
  encodeKey: (id) => id,
  create: (input, ctx) => ({
    payment_id: ctx.id,
    order_id: input.order_id,
    payment_method: input.payment_method,
    payment_date: input.payment_date,
    amount: input.amount,
    created_at: ctx.now,
    updated_at: ctx.now,
  }),
  applyPatch: (r, patch) =>
    overwrite(r, patch, ["payment_method", "payment_date", "amount"]),
  links: paymentLinks,
  fields: {
    order_id: { kind: "string", get: (r) => r.order_id },
    payment_method: { kind: "string", get: (r) => r.payment_method },
    amount: { kind: "number", get: (r) => r.amount },
    payment_date: { kind: "date", get: (r) => r.payment_date },
    ...timestampFields<PaymentRecord>(),
  },
  equalityFields: ["order_id", "payment_method"],
  rangeFields: ["amount", "payment_date"],
  sortFields: ["payment_date", "amount", "payment_method", "order_id", "created_at", "updated_at"],
};

// =============================================================================
// Order Detail
// =============================================================================

export function encodeOrderDetailKey(key: OrderDetailKey): string {
  return `${key.order_id}/${key.prod_id}`;
}

export const orderDetailDefinition: EntityDefinition<
  OrderDetailRecord,
  OrderDetailLinks,
  OrderDetailKey,
  OrderDetailInput,
  OrderDetailPatch
> = {
  label: "Order detail",
  keyOf: (r) => ({ order_id: r.order_id, prod_id: r.prod_id }),
  encodeKey: encodeOrderDetailKey,
  // Composite natural key: the generated id is not used.
  create: (input, ctx) => ({
    order_id: input.order_id,
    prod_id: input.prod_id,
    quantity: input.quantity,
    subtotal: input.subtotal,
    created_at: ctx.now,
    updated_at: ctx.now,
  }),
  applyPatch: (r, patch) => overwrite(r, patch, ["quantity", "subtotal"]),
  links: orderDetailLinks,
  fields: {
    order_id: { kind: "string", get: (r) => r.order_id },
    prod_id: { kind: "string", get: (r) => r.prod_id },
    quantity: { kind: "number", get: (r) => r.quantity },
    subtotal: { kind: "number", get: (r) => r.subtotal },
    ...timestampFields<OrderDetailRecord>(),
  },
  equalityFields: ["order_id", "prod_id"],
  rangeFields: ["quantity", "subtotal"],
  sortFields: ["quantity", "subtotal", "order_id", "prod_id", "created_at", "updated_at"],
};
