/**
 * Typebox schemas for metrics API routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const SearchQuery = Type.Object({
  q: Type.String(),
});

export type SearchQuery = Static<typeof SearchQuery>;

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

export const MetricNameParams = Type.Object({
  name: Type.String({ minLength: 1 }),
});

export type MetricNameParams = Static<typeof MetricNameParams>;
