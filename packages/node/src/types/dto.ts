/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, query and path validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * ISO 8601 timestamp with a zone designator, normalized to UTC.
 */
export const TimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

export const AmountSchema = z.number().finite().min(0);

export const ListQueryBaseSchema = z.object({
  sort_by: z.string().optional(),
  order: z.enum(["asc", "desc"]).default("asc"),
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListQueryBase = z.infer<typeof ListQueryBaseSchema>;

// =============================================================================
// Order DTOs
// =============================================================================

export const OrderIdParamSchema = z.object({
  order_id: z.string().uuid(),
});

export const CreateOrderSchema = z.object({
  user_id: z.string().uuid(),
  total_price: AmountSchema,
  status: z.string().min(1).optional(),
  order_date: TimestampSchema.optional(),
});

export type CreateOrderDto = z.infer<typeof CreateOrderSchema>;

export const UpdateOrderSchema = z.object({
  user_id: z.string().uuid().optional(),
  order_date: TimestampSchema.optional(),
  total_price: AmountSchema.optional(),
  status: z.string().min(1).optional(),
});

export type UpdateOrderDto = z.infer<typeof UpdateOrderSchema>;

export const ListOrdersQuerySchema = ListQueryBaseSchema.extend({
  user_id: z.string().uuid().optional(),
  status: z.string().optional(),
  min_total_price: z.coerce.number().optional(),
  max_total_price: z.coerce.number().optional(),
  min_order_date: TimestampSchema.optional(),
  max_order_date: TimestampSchema.optional(),
});

export type ListOrdersQuery = z.infer<typeof ListOrdersQuerySchema>;

// =============================================================================
// Payment DTOs
// =============================================================================

export const PaymentIdParamSchema = z.object({
  payment_id: z.string().uuid(),
});

export const CreatePaymentSchema = z.object({
  order_id: z.string().uuid(),
  payment_method: z.string().min(1),
  payment_date: TimestampSchema,
  amount: AmountSchema,
});

export type CreatePaymentDto = z.infer<typeof CreatePaymentSchema>;

export const UpdatePaymentSchema = z.object({
  payment_method: z.string().min(1).optional(),
  payment_date: TimestampSchema.optional(),
  amount: AmountSchema.optional(),
});

export type UpdatePaymentDto = z.infer<typeof UpdatePaymentSchema>;

export const ListPaymentsQuerySchema = ListQueryBaseSchema.extend({
  order_id: z.string().uuid().optional(),
  payment_method: z.string().optional(),
  min_amount: z.coerce.number().optional(),
  max_amount: z.coerce.number().optional(),
  min_payment_date: TimestampSchema.optional(),
  max_payment_date: TimestampSchema.optional(),
});

export type ListPaymentsQuery = z.infer<typeof ListPaymentsQuerySchema>;

// =============================================================================
// Order Detail DTOs
// =============================================================================

export const OrderDetailKeyParamSchema = z.object({
  order_id: z.string().uuid(),
  prod_id: z.string().uuid(),
});

export const CreateOrderDetailSchema = z.object({
  order_id: z.string().uuid(),
  prod_id: z.string().uuid(),
  quantity: z.number().int().min(1),
  subtotal: AmountSchema,
});

export type CreateOrderDetailDto = z.infer<typeof CreateOrderDetailSchema>;

export const UpdateOrderDetailSchema = z.object({
  quantity: z.number().int().min(1).optional(),
  subtotal: AmountSchema.optional(),
});

export type UpdateOrderDetailDto = z.infer<typeof UpdateOrderDetailSchema>;

export const ListOrderDetailsQuerySchema = ListQueryBaseSchema.extend({
  order_id: z.string().uuid().optional(),
  prod_id: z.string().uuid().optional(),
  min_quantity: z.coerce.number().optional(),
  max_quantity: z.coerce.number().optional(),
  min_subtotal: z.coerce.number().optional(),
  max_subtotal: z.coerce.number().optional(),
});

export type ListOrderDetailsQuery = z.infer<typeof ListOrderDetailsQuerySchema>;

// =============================================================================
// Task DTOs
// =============================================================================

export const TaskIdParamSchema = z.object({
  task_id: z.string().min(1),
});
