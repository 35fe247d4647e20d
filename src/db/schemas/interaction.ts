/**
 * Zod schemas for likes and comments.
 * `likes` carries a unique index on (userId, memeId); comments form a tree per
 * meme through `parentId`.
 */
import { z } from "zod";

export const LikeSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  memeId: z.string(),
  createdAt: z.date(),
});

export const CommentSchema = z.object({
  _id: z.string(),
  memeId: z.string(),
  authorId: z.string(),
  parentId: z.string().nullable(),
  body: z.string(),
  createdAt: z.date(),
});

export type LikeDoc = z.infer<typeof LikeSchema>;
export type CommentDoc = z.infer<typeof CommentSchema>;
