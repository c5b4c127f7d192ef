/**
 * Test entity used across the store tests.
 *
 * A "widget" has a synthetic id, a name, a weight and a made_on date.
 */

import type { EntityDefinition } from "../src/types.js";

export interface WidgetRecord {
  readonly widget_id: string;
  readonly name: string;
  readonly weight: number;
  readonly made_on: string;
  readonly created_at: string;
  readonly updated_at: string;
  readonly links?: Readonly<Record<string, string>>;
}

// Type alias, not interface: links must be assignable to a string record.
export type WidgetLinks = {
  readonly self: string;
};

export interface WidgetInput {
  readonly name: string;
  readonly weight: number;
  readonly made_on: string;
}

export interface WidgetPatch {
  readonly name?: string | undefined;
  readonly weight?: number | undefined;
}

export const widgetDefinition: EntityDefinition<
  WidgetRecord,
  WidgetLinks,
  string,
  WidgetInput,
  WidgetPatch
> = {
  label: "Widget",
  keyOf: (r) => r.widget_id,
  encodeKey: (k) => k,
  create: (input, ctx) => ({
    widget_id: ctx.id,
    name: input.name,
    weight: input.weight,
    made_on: input.made_on,
    created_at: ctx.now,
    updated_at: ctx.now,
  }),
  applyPatch: (r, patch) => ({
    ...r,
    ...(patch.name !== undefined ? { name: patch.name } : {}),
    ...(patch.weight !== undefined ? { weight: patch.weight } : {}),
  }),
  links: (r) => ({ self: `/widgets/${r.widget_id}` }),
  fields: {
    name: { kind: "string", get: (r) => r.name },
    weight: { kind: "number", get: (r) => r.weight },
    made_on: { kind: "date", get: (r) => r.made_on },
  },
  equalityFields: ["name"],
  rangeFields: ["weight", "made_on"],
  sortFields: ["name", "weight", "made_on"],
};

/**
 * Sequential id generator: "w-1", "w-2", ...
 */
export function sequentialIds(prefix = "w"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/**
 * Clock source that advances by one second per call from a fixed start.
 */
export function steppingSource(startIso = "2025-01-01T00:00:00.000Z"): () => number {
  let t = Date.parse(startIso);
  return () => {
    const current = t;
    t += 1000;
    return current;
  };
}
