/**
 * API Response Schemas
 *
 * Shapes of the raw PostHog REST responses we read. Parsed with Zod at
 * the HTTP boundary, then mapped to our internal types (src/types/) by
 * the client.
 */

import { z } from 'zod';

// ─── PostHog API Responses ───────────────────────────────────

export const PosthogUserSchema = z.object({
  email: z.string().nullish(),
  distinct_id: z.string().nullish(),
});

export const PosthogProjectSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  name: z.string().nullish(),
});

export const PosthogProjectListSchema = z.object({
  next: z.string().nullish(),
  results: z.array(PosthogProjectSchema),
});

/** `POST /api/projects/:id/query/` for a HogQLQuery: rows of column values. */
export const HogQLResponseSchema = z.object({
  results: z.array(z.array(z.unknown())).default([]),
  columns: z.array(z.string()).optional(),
});

/** Request body of a HogQL query. Placeholders in `query` are bound from `values`. */
export interface HogQLQuery {
  kind: 'HogQLQuery';
  query: string;
  values?: Record<string, string | number | string[]>;
}
