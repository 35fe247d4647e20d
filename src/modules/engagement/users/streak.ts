/**
 * Login streak transitions over UTC day stamps.
 *
 * Same day keeps the streak, the following day extends it, a gap restarts it
 * at 1. A login stamped earlier than the last recorded day (clock skew,
 * replayed request) leaves the streak untouched.
 */
import type { LoginStreak } from "@/db/schemas/user";

/** Lost races tolerated before a login fails. */
export const STREAK_SWAP_ATTEMPTS = 5;

export function computeNextStreak(
  previous: LoginStreak,
  dayStamp: number,
): LoginStreak {
  const last = previous.lastLoginDay;
  if (last !== null && dayStamp <= last) return previous;

  const current = last !== null && last === dayStamp - 1 ? previous.current + 1 : 1;
  return {
    lastLoginDay: dayStamp,
    current,
    best: Math.max(previous.best, current),
  };
}

export const sameStreak = (a: LoginStreak, b: LoginStreak): boolean =>
  a.lastLoginDay === b.lastLoginDay && a.current === b.current && a.best === b.best;

/**
 * The streak as shown to the user on `todayStamp`: a streak whose last login
 * is older than yesterday has lapsed, though `best` keeps it.
 */
export function visibleStreak(streak: LoginStreak, todayStamp: number): LoginStreak {
  const last = streak.lastLoginDay;
  if (last === null || last >= todayStamp - 1) return streak;
  return { ...streak, current: 0 };
}
