/**
 * Activity Service.
 *
 * Purpose: record user-visible actions for profile and history display.
 * Not an input to point or badge computation.
 */
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { EngagementError, storeUnavailable } from "../errors";
import { newId, type PageOptions } from "../ids";
import type { ActivityRepository } from "./repository";
import type { Activity, AppendActivityInput } from "./types";

export class ActivityService {
  constructor(
    private readonly repo: ActivityRepository,
    private readonly clock: () => Date,
  ) {}

  async append(input: AppendActivityInput): Promise<Result<Activity, EngagementError>> {
    const activity: Activity = {
      _id: input.key ?? newId(),
      userId: input.userId,
      kind: input.kind,
      reference: input.reference,
      metadata: { ...input.metadata },
      createdAt: this.clock(),
    };
    const res = await this.repo.append(activity);
    if (res.isErr()) return ErrResult(storeUnavailable("Activity.append", res.error));
    return OkResult(res.unwrap());
  }

  async list(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<Activity[], EngagementError>> {
    const res = await this.repo.listForUser(userId, page);
    if (res.isErr()) return ErrResult(storeUnavailable("Activity.list", res.error));
    return OkResult(res.unwrap());
  }
}
