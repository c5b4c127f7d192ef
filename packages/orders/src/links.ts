/**
 * Link Generator: identity → relation → relative path.
 *
 * Pure and deterministic: the same identity always yields the same
 * links, in the same key order. Nothing here reads a store.
 */

import type {
  OrderDetailKey,
  OrderDetailLinks,
  OrderLinks,
  PaymentLinks,
  TaskLinks,
} from "@ordergrid/types";

export function orderLinks(order: { readonly order_id: string }): OrderLinks {
  const id = order.order_id;
  return {
    self: `/orders/${id}`,
    payments: `/payments?order_id=${id}`,
    order_details: `/order-details?order_id=${id}`,
  };
}

export function paymentLinks(payment: {
  readonly payment_id: string;
  readonly order_id: string;
}): PaymentLinks {
  return {
    self: `/payments/${payment.payment_id}`,
    order: `/orders/${payment.order_id}`,
  };
}

export function orderDetailLinks(detail: OrderDetailKey): OrderDetailLinks {
  return {
    self: `/order-details/${detail.order_id}/${detail.prod_id}`,
    order: `/orders/${detail.order_id}`,
  };
}

export function taskLinks(taskId: string): TaskLinks {
  return {
    self: `/tasks/${taskId}`,
    status: taskStatusPath(taskId),
  };
}

export function taskStatusPath(taskId: string): string {
  return `/tasks/${taskId}/status`;
}
