/**
 * Entry point of the engagement engine as a library.
 */
export * from "@/modules/engagement";
export * from "@/configuration";
export { createEngagementHooks, clearEngagementHooks } from "@/events/hooks/engagement";
export type { EngagementHooks } from "@/events/hooks/engagement";
export { createEventHook } from "@/events/hooks/createEventHook";
export type { Result } from "@/utils/result";
export { OkResult, ErrResult } from "@/utils/result";
export { MemoryDatabase } from "@/db/memory";
export { ENGAGEMENT_INDEXES, ensureEngagementIndexes } from "@/db/indexes";
export { closeDb, configureMongo } from "@/db/mongo";
