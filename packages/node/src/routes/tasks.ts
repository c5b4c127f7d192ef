/**
 * Task routes.
 *
 * GET /tasks/:task_id/status  Poll a background task
 * GET /tasks/:task_id         Same view; target of the task's self link
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TaskIdParamSchema } from "../types/dto.js";
import { validateParams } from "../middleware/validate.js";

export function createTaskRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:task_id/status", validateParams(TaskIdParamSchema), (c) => {
    const service = c.get("service");
    return c.json(service.tasks.getStatus(c.req.valid("param").task_id));
  });

  routes.get("/:task_id", validateParams(TaskIdParamSchema), (c) => {
    const service = c.get("service");
    return c.json(service.tasks.getStatus(c.req.valid("param").task_id));
  });

  return routes;
}
