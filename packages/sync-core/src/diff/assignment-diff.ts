/**
 * Post assignment diff
 *
 * Per eligible post: link SHOULD − IS, unlink IS − SHOULD. Posts outside the
 * eligible set are never touched, whatever their IS state.
 */

import type { AssignmentMap, AssignmentOperation } from '../types/index.js';

const EMPTY: ReadonlySet<string> = new Set();

function sorted(values: Iterable<string>): string[] {
  return [...values].sort();
}

export function computeAssignmentDiff(
  is: AssignmentMap,
  should: AssignmentMap,
  eligible: ReadonlySet<string>
): AssignmentOperation[] {
  const operations: AssignmentOperation[] = [];

  for (const postId of sorted(eligible)) {
    const target = should.get(postId);
    // No SHOULD for this post: leave it alone
    if (!target) continue;
    const current = is.get(postId) ?? EMPTY;

    for (const personId of sorted(target)) {
      if (!current.has(personId)) operations.push({ kind: 'link', postId, personId });
    }
    for (const personId of sorted(current)) {
      if (!target.has(personId)) operations.push({ kind: 'unlink', postId, personId });
    }
  }

  return operations;
}

/** Apply operations to a copy of `is` */
export function applyAssignmentOperations(is: AssignmentMap, operations: AssignmentOperation[]): AssignmentMap {
  const result: AssignmentMap = new Map();
  for (const [postId, holders] of is) {
    result.set(postId, new Set(holders));
  }

  for (const operation of operations) {
    const holders = result.get(operation.postId) ?? new Set<string>();
    if (operation.kind === 'link') {
      holders.add(operation.personId);
    } else {
      holders.delete(operation.personId);
    }
    if (holders.size === 0) {
      result.delete(operation.postId);
    } else {
      result.set(operation.postId, holders);
    }
  }

  return result;
}
