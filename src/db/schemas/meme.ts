/**
 * Zod schema for meme documents. `contentRef` is opaque here (image storage
 * lives elsewhere); the counters mirror the like and comment tables.
 */
import { z } from "zod";

export const MemeSchema = z.object({
  _id: z.string(),
  ownerId: z.string(),
  contentRef: z.string(),
  likeCount: z.number().int().nonnegative(),
  commentCount: z.number().int().nonnegative(),
  createdAt: z.date(),
});

export type MemeDoc = z.infer<typeof MemeSchema>;
