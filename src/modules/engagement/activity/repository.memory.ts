import { compareNewestFirst, type MemoryDatabase } from "@/db/memory";
import { deepClone } from "@/db/helpers";
import type { UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import { clampPageSize, type PageOptions } from "../ids";
import type { ActivityRepository } from "./repository";
import type { Activity } from "./types";

export class MemoryActivityRepository implements ActivityRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async append(activity: Activity): Promise<Result<Activity, Error>> {
    const existing = this.db.activities.get(activity._id);
    if (existing) return OkResult(deepClone(existing));
    this.db.activities.set(activity._id, deepClone(activity));
    return OkResult(deepClone(activity));
  }

  async listForUser(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<Activity[], Error>> {
    const before = page.before?.getTime();
    const rows = [...this.db.activities.values()]
      .filter(
        (row) =>
          row.userId === userId &&
          (before === undefined || row.createdAt.getTime() < before),
      )
      .sort(compareNewestFirst)
      .slice(0, clampPageSize(page.limit));
    return OkResult(rows.map(deepClone));
  }
}
