/**
 * Store factories for the three collections.
 */

import { EntityStore } from "@ordergrid/store";
import type { EntityStoreOptions } from "@ordergrid/store";
import type {
  Order,
  OrderDetail,
  OrderDetailInput,
  OrderDetailKey,
  OrderDetailLinks,
  OrderDetailPatch,
  OrderDetailRecord,
  OrderInput,
  OrderLinks,
  OrderPatch,
  OrderRecord,
  Payment,
  PaymentInput,
  PaymentLinks,
  PaymentPatch,
  PaymentRecord,
} from "@ordergrid/types";
import {
  orderDefinition,
  orderDetailDefinition,
  paymentDefinition,
} from "./definitions.js";

export type OrderStore = EntityStore<OrderRecord, OrderLinks, string, OrderInput, OrderPatch>;
export type PaymentStore = EntityStore<PaymentRecord, PaymentLinks, string, PaymentInput, PaymentPatch>;
export type OrderDetailStore = EntityStore<
  OrderDetailRecord,
  OrderDetailLinks,
  OrderDetailKey,
  OrderDetailInput,
  OrderDetailPatch
>;

export function createOrderStore(
  options: EntityStoreOptions<OrderRecord, Order> = {},
): OrderStore {
  return new EntityStore(orderDefinition, options);
}

export function createPaymentStore(
  options: EntityStoreOptions<PaymentRecord, Payment> = {},
): PaymentStore {
  return new EntityStore(paymentDefinition, options);
}

export function createOrderDetailStore(
  options: EntityStoreOptions<OrderDetailRecord, OrderDetail> = {},
): OrderDetailStore {
  return new EntityStore(orderDetailDefinition, options);
}
