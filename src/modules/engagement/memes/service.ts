/**
 * Memes Service.
 *
 * Purpose: register a meme created by the rendering pipeline and credit its
 * owner. Every step after the insert is keyed by the meme id, so replaying a
 * creation (same `memeId`) completes whatever a failed attempt left undone
 * without crediting twice.
 *
 * Meme-count milestones are swept on every creation: each one at or below
 * the owner's count is recorded under its own key, so a milestone missed by
 * a failed or concurrent creation is credited by the next one.
 */
import type { MemeId, UserId } from "@/db/types";
import type { EngagementHooks } from "@/events/hooks/engagement";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ActivityService } from "../activity/service";
import { activityKeys } from "../activity/types";
import type { BadgeService } from "../badges/service";
import { EngagementError, storeUnavailable } from "../errors";
import { newId, requireId } from "../ids";
import { milestonesReached, type MemeMilestone } from "../ledger/policy";
import type { LedgerService } from "../ledger/service";
import type { UsersRepository } from "../users/repository";
import type { MemesRepository } from "./repository";
import type { CreateMemeInput, CreateMemeOutcome, Meme } from "./types";

const MAX_CONTENT_REF_LENGTH = 2048;

export interface MemesServiceDeps {
  readonly memes: MemesRepository;
  readonly users: UsersRepository;
  readonly ledger: LedgerService;
  readonly activity: ActivityService;
  readonly badges: BadgeService;
  readonly hooks: EngagementHooks;
  readonly clock: () => Date;
}

export class MemesService {
  constructor(private readonly deps: MemesServiceDeps) {}

  async createMeme(
    input: CreateMemeInput,
  ): Promise<Result<CreateMemeOutcome, EngagementError>> {
    const ownerRes = requireId(input.ownerId, "user id");
    if (ownerRes.isErr()) return ErrResult(ownerRes.error);
    const idRes = requireId(input.memeId ?? newId(), "meme id");
    if (idRes.isErr()) return ErrResult(idRes.error);

    const contentRef = input.contentRef.trim();
    if (!contentRef || contentRef.length > MAX_CONTENT_REF_LENGTH) {
      return ErrResult(
        new EngagementError("INVALID_INPUT", "Meme content reference is required"),
      );
    }

    const meme: Meme = {
      _id: idRes.unwrap(),
      ownerId: input.ownerId,
      contentRef,
      likeCount: 0,
      commentCount: 0,
      createdAt: this.deps.clock(),
    };

    const res = await this.deps.memes.create(meme);
    if (res.isErr()) return ErrResult(storeUnavailable("Memes.create", res.error));

    const status = res.unwrap();
    if (status.status === "missing_owner") {
      return ErrResult(
        new EngagementError("USER_NOT_FOUND", `Unknown user ${input.ownerId}`),
      );
    }
    if (status.status === "duplicate" && status.meme.ownerId !== input.ownerId) {
      return ErrResult(
        new EngagementError("INVALID_INPUT", `Meme id ${meme._id} is already taken`),
      );
    }

    const stored = status.meme;
    const points = await this.deps.ledger.record({
      reason: "meme_created",
      userId: stored.ownerId,
      memeId: stored._id,
    });
    if (points.isErr()) return ErrResult(points.error);

    const logged = await this.deps.activity.append({
      userId: stored.ownerId,
      kind: "meme_created",
      reference: stored._id,
      key: activityKeys.memeCreated(stored._id),
    });
    if (logged.isErr()) return ErrResult(logged.error);

    const evaluated = await this.deps.badges.evaluate(stored.ownerId, ["memesCreated"]);
    if (evaluated.isErr()) return ErrResult(evaluated.error);

    const milestones = await this.awardMilestones(stored.ownerId);
    if (milestones.isErr()) return ErrResult(milestones.error);

    const created = status.status === "created";
    if (created) void this.deps.hooks.memeCreated.emit(stored);

    return OkResult({
      meme: stored,
      created,
      points: points.unwrap(),
      milestones: milestones.unwrap(),
    });
  }

  private async awardMilestones(
    ownerId: UserId,
  ): Promise<Result<MemeMilestone[], EngagementError>> {
    const ownerRes = await this.deps.users.get(ownerId);
    if (ownerRes.isErr()) return ErrResult(storeUnavailable("Memes.milestones", ownerRes.error));
    const owner = ownerRes.unwrap();
    if (!owner) return OkResult([]);

    const credited: MemeMilestone[] = [];
    for (const milestone of milestonesReached(owner.stats.memesCreated)) {
      const recorded = await this.deps.ledger.record({
        reason: "bonus",
        userId: ownerId,
        milestone,
      });
      if (recorded.isErr()) return ErrResult(recorded.error);

      const { applied, transaction } = recorded.unwrap();
      const logged = await this.deps.activity.append({
        userId: ownerId,
        kind: "milestone_reached",
        reference: transaction._id,
        metadata: {
          memes: milestone.memes,
          amount: milestone.points,
          title: milestone.title,
        },
        key: activityKeys.milestoneReached(transaction._id),
      });
      if (logged.isErr()) return ErrResult(logged.error);
      if (applied) credited.push(milestone);
    }
    return OkResult(credited);
  }

  async getMeme(memeId: MemeId): Promise<Result<Meme, EngagementError>> {
    const res = await this.deps.memes.get(memeId);
    if (res.isErr()) return ErrResult(storeUnavailable("Memes.get", res.error));
    const meme = res.unwrap();
    if (!meme) {
      return ErrResult(new EngagementError("MEME_NOT_FOUND", `Unknown meme ${memeId}`));
    }
    return OkResult(meme);
  }
}
