/**
 * Check #3: post holders match the memberships resolved by check #2.
 * Only posts whose SHOULD state is complete are touched.
 */

import { computeAssignmentDiff } from '../diff/index.js';
import { SyncError } from '../errors/index.js';
import { buildAssignmentIs, eligiblePosts } from '../state/index.js';
import type { Check } from './context.js';

export const postAssignmentCheck: Check = {
  id: 'post-assignment',
  title: 'Post assignment',

  async run(context, ledger) {
    const plan = context.shared.assignments;
    if (!plan) {
      throw new SyncError({
        code: 'STATE_UNAVAILABLE',
        message: 'Post assignment needs the person sync results of the same run',
        suggestion: 'Run the person-sync check before post-assignment.',
      });
    }

    const eligible = eligiblePosts(plan.should);
    const rows = await context.state.listAssignments();
    const is = buildAssignmentIs(rows, eligible);
    const operations = computeAssignmentDiff(is, plan.should.byPost, eligible);

    const personNames = new Map(plan.personNames);
    for (const row of rows) {
      if (!personNames.has(row.personId)) personNames.set(row.personId, row.personName);
    }

    context.logger.info('Post assignments compared', {
      eligiblePosts: eligible.size,
      skippedPosts: plan.should.unresolvedPosts.size,
      operations: operations.length,
    });

    for (const operation of operations) {
      const postLabel = plan.postLabels.get(operation.postId) ?? operation.postId;
      const personName = personNames.get(operation.personId) ?? operation.personId;
      const subject = { postId: operation.postId, postLabel, personId: operation.personId, personName };

      if (operation.kind === 'link') {
        const result = await context.executor.linkPersonToPost(operation.personId, operation.postId);
        ledger.recordRemediation(
          { type: 'assignment_added', ...subject, message: `Assigned ${personName} to post ${postLabel}` },
          result
        );
      } else {
        const result = await context.executor.unlinkPersonFromPost(operation.personId, operation.postId);
        ledger.recordRemediation(
          { type: 'assignment_removed', ...subject, message: `Removed ${personName} from post ${postLabel}` },
          result
        );
      }
    }
  },
};
