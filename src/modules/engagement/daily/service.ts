/**
 * Daily Login Service.
 *
 * Purpose: credit one point per UTC calendar day and maintain the login
 * streak.
 * Invariants: the ledger key `login:{userId}:{YYYY-MM-DD}` makes the credit
 * once per day. The streak update is a no-op for a day already counted, so
 * every step here can be replayed; a second login on the same day changes
 * nothing.
 */
import { formatUtcDay, getUtcDayStamp } from "@/db/helpers";
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ActivityService } from "../activity/service";
import { activityKeys } from "../activity/types";
import type { BadgeService } from "../badges/service";
import type { AwardedBadge } from "../badges/types";
import { EngagementError, storeUnavailable } from "../errors";
import { requireId } from "../ids";
import type { LedgerService } from "../ledger/service";
import type { PointTransaction } from "../ledger/types";
import type { UsersRepository } from "../users/repository";
import type { LoginStreak } from "../users/types";

export interface LoginOutcome {
  /** UTC calendar day the login was counted for. */
  readonly day: string;
  /** `false` when this day had already been credited. */
  readonly credited: boolean;
  readonly transaction: PointTransaction;
  readonly streak: LoginStreak;
  readonly badges: AwardedBadge[];
}

export interface DailyLoginServiceDeps {
  readonly users: UsersRepository;
  readonly ledger: LedgerService;
  readonly activity: ActivityService;
  readonly badges: BadgeService;
  readonly clock: () => Date;
}

export class DailyLoginService {
  constructor(private readonly deps: DailyLoginServiceDeps) {}

  async recordLogin(
    userId: UserId,
    at: Date = this.deps.clock(),
  ): Promise<Result<LoginOutcome, EngagementError>> {
    const idRes = requireId(userId, "user id");
    if (idRes.isErr()) return ErrResult(idRes.error);

    const day = formatUtcDay(at);
    const streakRes = await this.deps.users.recordLoginDay(userId, getUtcDayStamp(at), at);
    if (streakRes.isErr()) return ErrResult(storeUnavailable("Daily.login", streakRes.error));
    const streak = streakRes.unwrap();
    if (!streak) {
      return ErrResult(new EngagementError("USER_NOT_FOUND", `Unknown user ${userId}`));
    }

    const points = await this.deps.ledger.record({ reason: "daily_login", userId, day });
    if (points.isErr()) return ErrResult(points.error);
    const recorded = points.unwrap();

    const logged = await this.deps.activity.append({
      userId,
      kind: "daily_login",
      reference: recorded.transaction._id,
      metadata: { day, streak: streak.after.current },
      key: activityKeys.dailyLogin(userId, day),
    });
    if (logged.isErr()) return ErrResult(logged.error);

    const evaluated = await this.deps.badges.evaluate(userId, ["loginStreak"]);
    if (evaluated.isErr()) return ErrResult(evaluated.error);

    return OkResult({
      day,
      credited: recorded.applied,
      transaction: recorded.transaction,
      streak: streak.after,
      badges: evaluated.unwrap(),
    });
  }
}
