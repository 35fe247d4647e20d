/**
 * Activity Repository.
 *
 * Append-only: there is no update or delete. `_id` is either a fresh UUID or
 * the caller's stable key, so a duplicate-key error on insert means "already
 * appended" and resolves to the stored entry.
 */
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { MongoStore } from "@/db/mongo-store";
import { ActivitySchema, type ActivityDoc } from "@/db/schemas/activity";
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { clampPageSize, type PageOptions } from "../ids";
import type { Activity } from "./types";

export const ACTIVITY_COLLECTION = "activity";
export const ActivityStore = new MongoStore<ActivityDoc>(
  ACTIVITY_COLLECTION,
  ActivitySchema,
);

export interface ActivityRepository {
  append(activity: Activity): Promise<Result<Activity, Error>>;
  /** Newest first. */
  listForUser(userId: UserId, page?: PageOptions): Promise<Result<Activity[], Error>>;
}

class ActivityRepositoryImpl implements ActivityRepository {
  async append(activity: Activity): Promise<Result<Activity, Error>> {
    try {
      const col = await ActivityStore.collection();
      await col.insertOne(activity);
      return OkResult(activity);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const existing = await ActivityStore.get(activity._id);
        if (existing.isErr()) return ErrResult(existing.error);
        const stored = existing.unwrap();
        if (stored) return OkResult(stored);
      }
      console.error("[ActivityRepository] append error:", error);
      return ErrResult(toError(error));
    }
  }

  listForUser(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<Activity[], Error>> {
    const filter = page.before
      ? { userId, createdAt: { $lt: page.before } }
      : { userId };
    return ActivityStore.find(filter, {
      sort: { createdAt: -1, _id: -1 },
      limit: clampPageSize(page.limit),
    });
  }
}

export const activityRepository: ActivityRepository = new ActivityRepositoryImpl();
