/**
 * Payment Types
 *
 * A payment references an order by id. The reference is not checked
 * against the order store.
 */

import type { PaymentLinks, ResourceLinks } from "./links.js";

export interface PaymentRecord {
  readonly payment_id: string;
  readonly order_id: string;
  /** Free-form (credit_card, paypal, bank_transfer, ...) */
  readonly payment_method: string;
  /** Client-supplied ISO 8601 timestamp */
  readonly payment_date: string;
  readonly amount: number;
  readonly created_at: string;
  readonly updated_at: string;
  readonly links?: ResourceLinks;
}

export interface Payment extends PaymentRecord {
  readonly links: PaymentLinks;
}

export interface PaymentInput {
  readonly order_id: string;
  readonly payment_method: string;
  readonly payment_date: string;
  readonly amount: number;
}

/**
 * The order reference is fixed at creation.
 */
export interface PaymentPatch {
  readonly payment_method?: string | undefined;
  readonly payment_date?: string | undefined;
  readonly amount?: number | undefined;
}
