/**
 * Zod validation middleware.
 *
 * Validates the request body, query string or path parameters against a
 * Zod schema through Hono's validator, so handlers read typed data with
 * `c.req.valid(target)`. Returns 422 with the error envelope on failure.
 */

import type { Context } from "hono";
import { validator } from "hono/validator";
import type { z, ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

type Target = "json" | "query" | "param";

const FAILURE_MESSAGES: Record<Target, string> = {
  json: "Request body validation failed",
  query: "Query parameter validation failed",
  param: "Path parameter validation failed",
};

function parseOrReject<TOut>(
  target: Target,
  schema: z.ZodType<TOut, z.ZodTypeDef, unknown>,
  value: unknown,
  c: Context,
) {
  const result = schema.safeParse(value);
  if (!result.success) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", FAILURE_MESSAGES[target], {
        issues: formatZodErrors(result.error),
      }),
      422,
    );
  }
  return result.data;
}

/**
 * Validate the JSON request body. Malformed JSON is rejected by Hono
 * before the schema runs and reaches the error handler.
 */
export function validateBody<TOut>(schema: z.ZodType<TOut, z.ZodTypeDef, unknown>) {
  return validator("json", (value, c) => parseOrReject("json", schema, value, c));
}

export function validateQuery<TOut>(schema: z.ZodType<TOut, z.ZodTypeDef, unknown>) {
  return validator("query", (value, c) => parseOrReject("query", schema, value, c));
}

export function validateParams<TOut>(schema: z.ZodType<TOut, z.ZodTypeDef, unknown>) {
  return validator("param", (value, c) => parseOrReject("param", schema, value, c));
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
