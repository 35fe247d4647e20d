/**
 * Build the reply tree for a meme's comments.
 *
 * Roots and replies are ordered by creation time (id breaks ties). A comment
 * whose parent is missing from the list is surfaced as a root rather than
 * dropped.
 */
import type { Comment, CommentThread } from "./types";

const byCreation = (a: Comment, b: Comment): number =>
  a.createdAt.getTime() - b.createdAt.getTime() ||
  (a._id < b._id ? -1 : a._id > b._id ? 1 : 0);

export function buildCommentTree(comments: readonly Comment[]): CommentThread[] {
  const nodes = new Map<string, { comment: Comment; replies: CommentThread[] }>();
  for (const comment of [...comments].sort(byCreation)) {
    nodes.set(comment._id, { comment, replies: [] });
  }

  const roots: CommentThread[] = [];
  for (const node of nodes.values()) {
    const parentId = node.comment.parentId;
    const parent = parentId && parentId !== node.comment._id ? nodes.get(parentId) : undefined;
    if (parent) {
      parent.replies.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

/** Depth-first count of every comment in the forest. */
export function countThread(threads: readonly CommentThread[]): number {
  let total = 0;
  for (const thread of threads) total += 1 + countThread(thread.replies);
  return total;
}
