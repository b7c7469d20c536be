/**
 * Assignment IS / SHOULD maps
 */

import type { AssignmentMap, AssignmentRow, AssignmentShould } from '../types/index.js';

export function emptyShould(): AssignmentShould {
  return { byPost: new Map(), unresolvedPosts: new Set() };
}

/** Record that `personId` should hold `postId` */
export function addShould(should: AssignmentShould, postId: string, personId: string): void {
  const holders = should.byPost.get(postId);
  if (holders) {
    holders.add(personId);
  } else {
    should.byPost.set(postId, new Set([personId]));
  }
}

/** Posts whose SHOULD state is fully known */
export function eligiblePosts(should: AssignmentShould): Set<string> {
  const eligible = new Set<string>();
  for (const postId of should.byPost.keys()) {
    if (!should.unresolvedPosts.has(postId)) eligible.add(postId);
  }
  return eligible;
}

/**
 * Current holders per post. Only eligible posts are kept; a post with no
 * holders is absent rather than mapped to an empty set.
 */
export function buildAssignmentIs(rows: AssignmentRow[], eligible?: ReadonlySet<string>): AssignmentMap {
  const is: AssignmentMap = new Map();
  for (const row of rows) {
    if (eligible && !eligible.has(row.postId)) continue;
    const holders = is.get(row.postId);
    if (holders) {
      holders.add(row.personId);
    } else {
      is.set(row.postId, new Set([row.personId]));
    }
  }
  return is;
}
