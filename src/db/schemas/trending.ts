/**
 * Zod schema for materialized trending views. One document per window key,
 * replaced whole on rebuild.
 */
import { z } from "zod";

export const TrendingCountsSchema = z.object({
  likes: z.number().int(),
  comments: z.number().int(),
});

export const TrendingViewSchema = z.object({
  _id: z.string(),
  start: z.date(),
  builtAt: z.date(),
  scores: z.record(z.string(), TrendingCountsSchema),
});

export type TrendingCounts = z.infer<typeof TrendingCountsSchema>;
export type TrendingViewDoc = z.infer<typeof TrendingViewSchema>;
