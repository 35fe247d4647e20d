import type { MemeDoc } from "@/db/schemas/meme";
import type { MemeId, UserId } from "@/db/types";
import type { MemeMilestone } from "../ledger/policy";
import type { RecordOutcome } from "../ledger/types";

export type Meme = MemeDoc;

export type CreateMemeStatus =
  | { status: "created"; meme: Meme }
  | { status: "duplicate"; meme: Meme }
  | { status: "missing_owner" };

export interface CreateMemeInput {
  readonly ownerId: UserId;
  /** Opaque pointer to the rendered image in external storage. */
  readonly contentRef: string;
  /** Caller-chosen id; replaying it makes creation idempotent. */
  readonly memeId?: MemeId;
}

export interface CreateMemeOutcome {
  readonly meme: Meme;
  readonly created: boolean;
  readonly points: RecordOutcome;
  /** Milestone bonuses credited by this call. */
  readonly milestones: MemeMilestone[];
}
