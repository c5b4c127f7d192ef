/**
 * Order routes.
 *
 * POST   /orders              Create an order (201 + Location + ETag)
 * GET    /orders              List orders (filter, sort, offset pagination)
 * POST   /orders/process      Create an order in the background (202 + task)
 * GET    /orders/:order_id    Get an order (conditional on If-None-Match)
 * PUT    /orders/:order_id    Update an order (requires If-Match)
 * DELETE /orders/:order_id    Not implemented (501)
 */

import { Hono } from "hono";
import { taskLinks, toOrderRepresentation } from "@ordergrid/orders";
import type { TaskAccepted } from "@ordergrid/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateOrderSchema,
  ListOrdersQuerySchema,
  OrderIdParamSchema,
  UpdateOrderSchema,
} from "../types/dto.js";
import { respondWithList } from "../types/pagination.js";
import { validateBody, validateParams, validateQuery } from "../middleware/validate.js";
import {
  ifMatchGuard,
  respondConditionally,
  respondWithETag,
} from "../middleware/conditional.js";

export const PROCESSING_STARTED_MESSAGE =
  "Order processing started. Poll the status URL for updates.";

export function createOrderRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Create
  routes.post("/", validateBody(CreateOrderSchema), async (c) => {
    const service = c.get("service");
    const order = toOrderRepresentation(
      await service.orders.create(c.req.valid("json")),
    );

    c.header("Location", order.links.self);
    return respondWithETag(c, order, 201);
  });

  // List
  routes.get("/", validateQuery(ListOrdersQuerySchema), async (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const { items, total } = await service.orders.list({
      equals: { user_id: query.user_id, status: query.status },
      ranges: {
        total_price: { min: query.min_total_price, max: query.max_total_price },
        order_date: { min: query.min_order_date, max: query.max_order_date },
      },
      sortBy: query.sort_by,
      order: query.order,
      offset: query.offset,
      limit: query.limit,
    });

    return respondWithList(c, items.map(toOrderRepresentation), total);
  });

  // Start background creation
  routes.post("/process", validateBody(CreateOrderSchema), (c) => {
    const service = c.get("service");
    const { task_id, status_url } = service.tasks.start(c.req.valid("json"));

    const accepted: TaskAccepted = {
      task_id,
      status_url,
      message: PROCESSING_STARTED_MESSAGE,
      links: taskLinks(task_id),
    };

    c.header("Location", status_url);
    return c.json(accepted, 202);
  });

  // Get one
  routes.get("/:order_id", validateParams(OrderIdParamSchema), async (c) => {
    const service = c.get("service");
    const { order_id } = c.req.valid("param");

    const order = await service.orders.get(order_id);
    return respondConditionally(c, toOrderRepresentation(order));
  });

  // Conditional update
  routes.put(
    "/:order_id",
    validateParams(OrderIdParamSchema),
    validateBody(UpdateOrderSchema),
    async (c) => {
      const service = c.get("service");
      const { order_id } = c.req.valid("param");

      const order = await service.orders.update(
        order_id,
        c.req.valid("json"),
        ifMatchGuard(c.req.header("If-Match"), toOrderRepresentation),
      );
      return respondWithETag(c, toOrderRepresentation(order));
    },
  );

  // Reserved
  routes.delete("/:order_id", validateParams(OrderIdParamSchema), (c) => {
    const service = c.get("service");
    return service.orders.delete(c.req.valid("param").order_id);
  });

  return routes;
}
