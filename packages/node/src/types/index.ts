/**
 * Type barrel: re-exports all public types from @ordergrid/node.
 */

// DTOs
export {
  TimestampSchema,
  AmountSchema,
  ListQueryBaseSchema,
  OrderIdParamSchema,
  CreateOrderSchema,
  UpdateOrderSchema,
  ListOrdersQuerySchema,
  PaymentIdParamSchema,
  CreatePaymentSchema,
  UpdatePaymentSchema,
  ListPaymentsQuerySchema,
  OrderDetailKeyParamSchema,
  CreateOrderDetailSchema,
  UpdateOrderDetailSchema,
  ListOrderDetailsQuerySchema,
  TaskIdParamSchema,
} from "./dto.js";
export type {
  ListQueryBase,
  CreateOrderDto,
  UpdateOrderDto,
  ListOrdersQuery,
  CreatePaymentDto,
  UpdatePaymentDto,
  ListPaymentsQuery,
  CreateOrderDetailDto,
  UpdateOrderDetailDto,
  ListOrderDetailsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ERROR_STATUS } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ErrorStatus } from "./error.js";

// Pagination
export { respondWithList, TOTAL_COUNT_HEADER } from "./pagination.js";

// Auth
export type { AuthContext, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
