/**
 * Payment routes.
 *
 * POST   /payments                Record a payment (201 + Location + ETag)
 * GET    /payments                List payments (filter, sort, offset pagination)
 * GET    /payments/:payment_id    Get a payment (conditional on If-None-Match)
 * PUT    /payments/:payment_id    Update a payment (requires If-Match)
 * DELETE /payments/:payment_id    Not implemented (501)
 *
 * The referenced order is not checked for existence.
 */

import { Hono } from "hono";
import { toPaymentRepresentation } from "@ordergrid/orders";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreatePaymentSchema,
  ListPaymentsQuerySchema,
  PaymentIdParamSchema,
  UpdatePaymentSchema,
} from "../types/dto.js";
import { respondWithList } from "../types/pagination.js";
import { validateBody, validateParams, validateQuery } from "../middleware/validate.js";
import {
  ifMatchGuard,
  respondConditionally,
  respondWithETag,
} from "../middleware/conditional.js";

export function createPaymentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreatePaymentSchema), async (c) => {
    const service = c.get("service");
    const payment = toPaymentRepresentation(
      await service.payments.create(c.req.valid("json")),
    );

    c.header("Location", payment.links.self);
    return respondWithETag(c, payment, 201);
  });

  routes.get("/", validateQuery(ListPaymentsQuerySchema), async (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const { items, total } = await service.payments.list({
      equals: { order_id: query.order_id, payment_method: query.payment_method },
      ranges: {
        amount: { min: query.min_amount, max: query.max_amount },
        payment_date: { min: query.min_payment_date, max: query.max_payment_date },
      },
      sortBy: query.sort_by,
      order: query.order,
      offset: query.offset,
      limit: query.limit,
    });

    return respondWithList(c, items.map(toPaymentRepresentation), total);
  });

  routes.get("/:payment_id", validateParams(PaymentIdParamSchema), async (c) => {
    const service = c.get("service");
    const { payment_id } = c.req.valid("param");

    const payment = await service.payments.get(payment_id);
    return respondConditionally(c, toPaymentRepresentation(payment));
  });

  routes.put(
    "/:payment_id",
    validateParams(PaymentIdParamSchema),
    validateBody(UpdatePaymentSchema),
    async (c) => {
      const service = c.get("service");
      const { payment_id } = c.req.valid("param");

      const payment = await service.payments.update(
        payment_id,
        c.req.valid("json"),
        ifMatchGuard(c.req.header("If-Match"), toPaymentRepresentation),
      );
      return respondWithETag(c, toPaymentRepresentation(payment));
    },
  );

  routes.delete("/:payment_id", validateParams(PaymentIdParamSchema), (c) => {
    const service = c.get("service");
    return service.payments.delete(c.req.valid("param").payment_id);
  });

  return routes;
}
