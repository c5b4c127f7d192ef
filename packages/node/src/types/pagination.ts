/**
 * Offset pagination.
 *
 * List endpoints answer with a bare JSON array of representations. The
 * number of items that passed the filters, before offset and limit, goes
 * in the X-Total-Count header.
 */

import type { Context } from "hono";

export const TOTAL_COUNT_HEADER = "X-Total-Count";

/**
 * Send one page of representations with the filtered total.
 */
export function respondWithList<T extends object>(
  c: Context,
  items: readonly T[],
  total: number,
): Response {
  c.header(TOTAL_COUNT_HEADER, String(total));
  return c.json(items, 200);
}
