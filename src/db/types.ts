// Typed aliases for identifiers to make intent explicit.
export type UserId = string;
export type MemeId = string;
export type LikeId = string;
export type CommentId = string;
export type BadgeId = string;
export type TransactionId = string;
export type ActivityId = string;
