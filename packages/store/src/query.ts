/**
 * @ordergrid/store: List query evaluation.
 *
 * Pipeline, always in this order:
 *   1. equality filters on indexed fields
 *   2. inclusive range filters (min/max)
 *   3. sort by a whitelisted field (stable; unknown field → no sort)
 *   4. offset, then limit
 *
 * Filters naming a field the entity does not index for that purpose
 * are ignored, the same way an unknown sort field is.
 */

import type {
  FieldKind,
  FieldSpec,
  FieldValue,
  ListQuery,
  ListResult,
} from "./types.js";

export interface QuerySchema<TRecord> {
  readonly fields: Readonly<Record<string, FieldSpec<TRecord>>>;
  readonly equalityFields: readonly string[];
  readonly rangeFields: readonly string[];
  readonly sortFields: readonly string[];
}

/**
 * Compare two field values by their kind's natural ordering.
 */
export function compareValues(
  kind: FieldKind,
  a: FieldValue,
  b: FieldValue,
): number {
  switch (kind) {
    case "number":
      return Number(a) - Number(b);
    case "date":
      return Date.parse(String(a)) - Date.parse(String(b));
    case "string": {
      const x = String(a);
      const y = String(b);
      return x < y ? -1 : x > y ? 1 : 0;
    }
  }
}

function lookup<TRecord>(
  schema: QuerySchema<TRecord>,
  allowed: readonly string[],
  name: string,
): FieldSpec<TRecord> | undefined {
  if (!allowed.includes(name)) {
    return undefined;
  }
  return schema.fields[name];
}

/**
 * Apply a ListQuery to a sequence of records.
 */
export function runQuery<TRecord>(
  records: readonly TRecord[],
  schema: QuerySchema<TRecord>,
  query: ListQuery = {},
): ListResult<TRecord> {
  let result = [...records];

  // 1. Equality
  for (const [name, value] of Object.entries(query.equals ?? {})) {
    if (value === undefined) continue;
    const spec = lookup(schema, schema.equalityFields, name);
    if (spec === undefined) continue;
    result = result.filter(
      (r) => compareValues(spec.kind, spec.get(r), value) === 0,
    );
  }

  // 2. Range
  for (const [name, bounds] of Object.entries(query.ranges ?? {})) {
    if (bounds === undefined) continue;
    const spec = lookup(schema, schema.rangeFields, name);
    if (spec === undefined) continue;
    const { min, max } = bounds;
    if (min !== undefined) {
      result = result.filter((r) => compareValues(spec.kind, spec.get(r), min) >= 0);
    }
    if (max !== undefined) {
      result = result.filter((r) => compareValues(spec.kind, spec.get(r), max) <= 0);
    }
  }

  const total = result.length;

  // 3. Sort
  if (query.sortBy !== undefined) {
    const spec = lookup(schema, schema.sortFields, query.sortBy);
    if (spec !== undefined) {
      const direction = query.order === "desc" ? -1 : 1;
      result.sort(
        (a, b) => direction * compareValues(spec.kind, spec.get(a), spec.get(b)),
      );
    }
  }

  // 4. Pagination
  const offset = query.offset ?? 0;
  const end = query.limit !== undefined ? offset + query.limit : undefined;
  const items = result.slice(offset, end);

  return { items, total };
}
