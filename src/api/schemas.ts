import { z } from 'zod';

// ── Request schemas ──────────────────────────────────────────────────────────

export const metadataSchema = z.record(
  z.string(),
  z.union([z.string(), z.number().finite(), z.boolean()]),
);

export const documentSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  metadata: metadataSchema.default({}),
});

export const indexBodySchema = documentSchema;

export const removeBodySchema = z.object({
  id: z.string().min(1),
});

export const searchBodySchema = z.object({
  query: z.string(),
  filters: z.record(z.string(), z.unknown()).nullable().optional(),
  limit: z.number().int().positive().default(20),
});

const flagSchema = z
  .enum(['0', '1', 'true', 'false'])
  .optional()
  .transform((value) => value === '1' || value === 'true');

export const searchQuerySchema = z.object({
  debug: flagSchema,
  bypass_cutoff: flagSchema,
});

export const rebuildBodySchema = z.object({
  listings: z.array(documentSchema),
});

export type IndexBody = z.input<typeof indexBodySchema>;
export type RemoveBody = z.input<typeof removeBodySchema>;
export type SearchBody = z.input<typeof searchBodySchema>;
export type SearchQuery = z.input<typeof searchQuerySchema>;
export type RebuildBody = z.input<typeof rebuildBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export const rankedResultSchema = z.object({
  pk: z.union([z.string(), z.number()]),
  distance: z.number(),
});

export const searchDebugSchema = z.object({
  bypass_cutoff: z.boolean(),
  raw_count: z.number().int(),
  raw_pks: z.array(z.union([z.string(), z.number()])),
  raw_distances: z.array(z.number()),
  keep_count: z.number().int(),
});

export const searchResponseSchema = z.object({
  results: z.array(rankedResultSchema),
  debug: searchDebugSchema.optional(),
});

export const okResponseSchema = z.object({ ok: z.literal(true) });

export const rebuildResponseSchema = z.object({
  ok: z.literal(true),
  count: z.number().int(),
});

export const healthResponseSchema = z.object({
  status: z.literal('ok'),
  model_loaded: z.boolean(),
  collection_count: z.number().int(),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type OkResponse = z.infer<typeof okResponseSchema>;
export type RebuildResponse = z.infer<typeof rebuildResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;

export interface ErrorResponse {
  error: string;
}
