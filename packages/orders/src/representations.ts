/**
 * Canonical representations.
 *
 * One serializer per resource. Its output is both the response body and
 * the input to the ETag computation, so both see exactly the same fields.
 * Fields are listed explicitly; anything else a record carries is dropped.
 */

import type {
  Order,
  OrderDetail,
  Payment,
  Task,
  TaskView,
} from "@ordergrid/types";
import { orderDetailLinks, orderLinks, paymentLinks, taskLinks } from "./links.js";

export function toOrderRepresentation(order: Order): Order {
  return {
    order_id: order.order_id,
    user_id: order.user_id,
    order_date: order.order_date,
    total_price: order.total_price,
    status: order.status,
    created_at: order.created_at,
    updated_at: order.updated_at,
    links: orderLinks(order),
  };
}

export function toPaymentRepresentation(payment: Payment): Payment {
  return {
    payment_id: payment.payment_id,
    order_id: payment.order_id,
    payment_method: payment.payment_method,
    payment_date: payment.payment_date,
    amount: payment.amount,
    created_at: payment.created_at,
    updated_at: payment.updated_at,
    links: paymentLinks(payment),
  };
}

export function toOrderDetailRepresentation(detail: OrderDetail): OrderDetail {
  return {
    order_id: detail.order_id,
    prod_id: detail.prod_id,
    quantity: detail.quantity,
    subtotal: detail.subtotal,
    created_at: detail.created_at,
    updated_at: detail.updated_at,
    links: orderDetailLinks(detail),
  };
}

export function toTaskView(task: Task): TaskView {
  return {
    task_id: task.task_id,
    status: task.status,
    created_at: task.created_at,
    updated_at: task.updated_at,
    result: task.result,
    error: task.error,
    links: taskLinks(task.task_id),
  };
}
