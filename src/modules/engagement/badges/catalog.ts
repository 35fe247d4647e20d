/**
 * Badge catalog loaded from `catalog.json` and validated at import time.
 * Adding a badge is a data change: extend the JSON, and only touch code when
 * a new criteria variant is needed.
 */
import rawCatalog from "./catalog.json";
import { criteriaStats } from "./criteria";
import {
  BadgeCatalogError,
  BadgeDefinitionSchema,
  type BadgeDefinition,
  type BadgeStat,
} from "./types";

export function parseBadgeCatalog(raw: unknown): BadgeDefinition[] {
  const parsed = BadgeDefinitionSchema.array()
    .min(1)
    .safeParse(
      typeof raw === "object" && raw !== null && "badges" in raw ? raw.badges : raw,
    );
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new BadgeCatalogError(
      `Invalid badge catalog at ${first?.path.join(".") ?? "?"}: ${first?.message ?? "unknown"}`,
    );
  }

  const seen = new Set<string>();
  for (const badge of parsed.data) {
    if (seen.has(badge.id)) {
      throw new BadgeCatalogError(`Duplicate badge id "${badge.id}"`);
    }
    seen.add(badge.id);
  }
  return parsed.data;
}

export class BadgeCatalog {
  private readonly byId: Map<string, BadgeDefinition>;
  private readonly dependencies: Map<string, Set<BadgeStat>>;

  constructor(readonly badges: readonly BadgeDefinition[]) {
    this.byId = new Map(badges.map((badge) => [badge.id, badge]));
    this.dependencies = new Map(
      badges.map((badge) => [badge.id, criteriaStats(badge.criteria)]),
    );
  }

  get(badgeId: string): BadgeDefinition | undefined {
    return this.byId.get(badgeId);
  }

  /** Badges that can change state when any of `triggers` changes. */
  affectedBy(triggers: readonly BadgeStat[]): BadgeDefinition[] {
    if (triggers.length === 0) return [...this.badges];
    return this.badges.filter((badge) => {
      const deps = this.dependencies.get(badge.id);
      return triggers.some((stat) => deps?.has(stat) ?? false);
    });
  }
}

export const DEFAULT_BADGE_CATALOG = new BadgeCatalog(parseBadgeCatalog(rawCatalog));
