/**
 * Human-readable lines for the activity feed.
 */
import type { Activity, ActivityMetadata } from "./types";

const text = (metadata: ActivityMetadata, key: string): string | null => {
  const value = metadata[key];
  return typeof value === "string" ? value : null;
};

const count = (metadata: ActivityMetadata, key: string): number | null => {
  const value = metadata[key];
  return typeof value === "number" ? value : null;
};

export function describeActivity(activity: Activity): string {
  const meta = activity.metadata;

  switch (activity.kind) {
    case "meme_created":
      return "Created a new meme";
    case "like_added":
      return "Liked a meme";
    case "like_removed":
      return "Removed a like";
    case "comment_added":
      return text(meta, "parentId") ? "Replied to a comment" : "Commented on a meme";
    case "daily_login": {
      const streak = count(meta, "streak");
      if (streak === null || streak <= 1) return "Logged in";
      return `Logged in (${streak}-day streak)`;
    }
    case "bonus_awarded": {
      const amount = count(meta, "amount") ?? 0;
      const note = text(meta, "note");
      return note
        ? `Received a ${amount}-point bonus: ${note}`
        : `Received a ${amount}-point bonus`;
    }
    case "milestone_reached": {
      const title = text(meta, "title") ?? "a creator";
      const amount = count(meta, "amount") ?? 0;
      return `Reached the ${title} milestone (+${amount} points)`;
    }
    case "rank_changed": {
      const to = text(meta, "to") ?? "a new rank";
      return meta.direction === "down" ? `Dropped to ${to}` : `Reached ${to}`;
    }
    case "badge_awarded": {
      const name = text(meta, "name") ?? activity.reference;
      const emoji = text(meta, "emoji");
      return emoji ? `Earned the ${emoji} ${name} badge` : `Earned the ${name} badge`;
    }
  }
}
