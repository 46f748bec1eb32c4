/**
 * Core Wire Schemas
 *
 * zod schemas for the JSON documents the Core returns. Unknown fields are
 * stripped; missing or null fields fall back to safe defaults (`found=false`,
 * empty paths, zero counts).
 */

import { z } from 'zod';

const nodeIdSchema = z.number().int().nonnegative();

/** Missing and null both fall back to the default */
function orDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.output<T>) {
  return schema.nullish().transform((value): z.output<T> => value ?? fallback);
}

export const coreEdgeSchema = z.object({
  from: nodeIdSchema,
  to: nodeIdSchema,
  weight: z.number(),
});

export const queryResponseSchema = z.object({
  success: orDefault(z.boolean(), false),
  found: orDefault(z.boolean(), false),
  path: orDefault(z.array(nodeIdSchema), []),
  edges: orDefault(z.array(coreEdgeSchema), []),
  error: z.string().nullish(),
});

export const signalResponseSchema = z.object({
  success: orDefault(z.boolean(), false),
  node_id: nodeIdSchema.nullish(),
  error: z.string().nullish(),
});

const countSchema = orDefault(z.number().int().nonnegative(), 0);

export const graphStatusSchema = z.object({
  node_count: countSchema,
  edge_count: countSchema,
  stable_edges: countSchema,
  density_millionths: countSchema,
});

export const stageInfoSchema = z.object({
  stage: orDefault(z.union([z.string(), z.number()]).transform(String), '?'),
  name: orDefault(z.string(), '?'),
  progress_percent: orDefault(z.number(), 0),
  stable_edges_needed: countSchema,
  stable_edges_current: countSchema,
});

export type CoreEdge = z.infer<typeof coreEdgeSchema>;
export type QueryResponse = z.infer<typeof queryResponseSchema>;
export type SignalResponse = z.infer<typeof signalResponseSchema>;
export type GraphStatus = z.infer<typeof graphStatusSchema>;
export type StageInfo = z.infer<typeof stageInfoSchema>;
