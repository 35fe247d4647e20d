/**
 * Zod schema for the activity log. Append-only; entries are display data and
 * never feed point or badge computation.
 */
import { z } from "zod";

export const ACTIVITY_KINDS = [
  "meme_created",
  "like_added",
  "like_removed",
  "comment_added",
  "daily_login",
  "bonus_awarded",
  "milestone_reached",
  "rank_changed",
  "badge_awarded",
] as const;

export const ActivityKindSchema = z.enum(ACTIVITY_KINDS);

export const ActivityMetadataSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);

export const ActivitySchema = z.object({
  _id: z.string(),
  userId: z.string(),
  kind: ActivityKindSchema,
  reference: z.string(),
  metadata: ActivityMetadataSchema,
  createdAt: z.date(),
});

export type ActivityKind = z.infer<typeof ActivityKindSchema>;
export type ActivityMetadata = z.infer<typeof ActivityMetadataSchema>;
export type ActivityDoc = z.infer<typeof ActivitySchema>;
