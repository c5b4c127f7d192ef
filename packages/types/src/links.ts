/**
 * Link Types
 *
 * Every representation returned to a client carries a `links` mapping of
 * relation name → relative path. Links are derived from identity, never
 * stored as ownership.
 */

/**
 * Relation name → relative path (e.g. `{ self: "/orders/42" }`).
 */
export type ResourceLinks = Readonly<Record<string, string>>;

// Declared as type aliases so each stays assignable to ResourceLinks.

export type OrderLinks = {
  readonly self: string;
  readonly payments: string;
  readonly order_details: string;
};

export type PaymentLinks = {
  readonly self: string;
  readonly order: string;
};

export type OrderDetailLinks = {
  readonly self: string;
  readonly order: string;
};

export type TaskLinks = {
  readonly self: string;
  readonly status: string;
};
