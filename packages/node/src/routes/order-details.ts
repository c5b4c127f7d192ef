/**
 * Order detail routes. Details are addressed by their composite key.
 *
 * POST   /order-details                       Create or replace a line item
 * GET    /order-details                       List line items
 * GET    /order-details/:order_id/:prod_id    Get a line item (conditional)
 * PUT    /order-details/:order_id/:prod_id    Update a line item (requires If-Match)
 * DELETE /order-details/:order_id/:prod_id    Not implemented (501)
 */

import { Hono } from "hono";
import { toOrderDetailRepresentation } from "@ordergrid/orders";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateOrderDetailSchema,
  ListOrderDetailsQuerySchema,
  OrderDetailKeyParamSchema,
  UpdateOrderDetailSchema,
} from "../types/dto.js";
import { respondWithList } from "../types/pagination.js";
import { validateBody, validateParams, validateQuery } from "../middleware/validate.js";
import {
  ifMatchGuard,
  respondConditionally,
  respondWithETag,
} from "../middleware/conditional.js";

export function createOrderDetailRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // A second create on an existing key replaces the stored detail
  routes.post("/", validateBody(CreateOrderDetailSchema), async (c) => {
    const service = c.get("service");
    const detail = toOrderDetailRepresentation(
      await service.orderDetails.create(c.req.valid("json")),
    );

    c.header("Location", detail.links.self);
    return respondWithETag(c, detail, 201);
  });

  routes.get("/", validateQuery(ListOrderDetailsQuerySchema), async (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const { items, total } = await service.orderDetails.list({
      equals: { order_id: query.order_id, prod_id: query.prod_id },
      ranges: {
        quantity: { min: query.min_quantity, max: query.max_quantity },
        subtotal: { min: query.min_subtotal, max: query.max_subtotal },
      },
      sortBy: query.sort_by,
      order: query.order,
      offset: query.offset,
      limit: query.limit,
    });

    return respondWithList(c, items.map(toOrderDetailRepresentation), total);
  });

  routes.get("/:order_id/:prod_id", validateParams(OrderDetailKeyParamSchema), async (c) => {
    const service = c.get("service");

    const detail = await service.orderDetails.get(c.req.valid("param"));
    return respondConditionally(c, toOrderDetailRepresentation(detail));
  });

  routes.put(
    "/:order_id/:prod_id",
    validateParams(OrderDetailKeyParamSchema),
    validateBody(UpdateOrderDetailSchema),
    async (c) => {
      const service = c.get("service");

      const detail = await service.orderDetails.update(
        c.req.valid("param"),
        c.req.valid("json"),
        ifMatchGuard(c.req.header("If-Match"), toOrderDetailRepresentation),
      );
      return respondWithETag(c, toOrderDetailRepresentation(detail));
    },
  );

  routes.delete("/:order_id/:prod_id", validateParams(OrderDetailKeyParamSchema), (c) => {
    const service = c.get("service");
    return service.orderDetails.delete(c.req.valid("param"));
  });

  return routes;
}
