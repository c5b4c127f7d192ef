/**
 * Hono environment for the OrderGrid app.
 *
 * Route handlers read these through c.get(); each is filled in by the
 * middleware named beside it.
 */

import type { OrderService } from "../services/order-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** request-id middleware */
    requestId: string;

    /** app setup: collections and task manager shared by all routes */
    service: OrderService;

    /** auth middleware, only on protected prefixes when auth is enabled */
    auth: AuthContext;
  };
}
