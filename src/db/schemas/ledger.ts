/**
 * Zod schema for point transactions (the ledger).
 * Rows are immutable. `idempotencyKey` is unique across the collection.
 */
import { z } from "zod";

export const POINT_REASONS = [
  "meme_created",
  "like_received",
  "comment_made",
  "daily_login",
  "bonus",
  "like_removed_reversal",
] as const;

export const PointReasonSchema = z.enum(POINT_REASONS);

export const PointTransactionSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  amount: z.number().int(),
  reason: PointReasonSchema,
  idempotencyKey: z.string().min(1),
  note: z.string().nullable(),
  /** The user's total right after this row was applied. */
  balanceAfter: z.number().int(),
  createdAt: z.date(),
});

export type PointReason = z.infer<typeof PointReasonSchema>;
export type PointTransactionDoc = z.infer<typeof PointTransactionSchema>;
