/**
 * Zod schema for badge awards. `_id` is `userId:badgeId`, so the primary key
 * itself guarantees one award per pair.
 */
import { z } from "zod";

export const BadgeAwardSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  badgeId: z.string(),
  awardedAt: z.date(),
});

export type BadgeAwardDoc = z.infer<typeof BadgeAwardSchema>;
