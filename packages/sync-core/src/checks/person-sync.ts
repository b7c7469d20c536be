/**
 * Check #2: persons named by post memberships exist in the catalog with the
 * directory's name and id. Produces the assignment SHOULD state for check #3.
 */

import {
  blankToNull,
  ConnectorError,
  errorMessage,
  formatFullName,
  type DirectoryPerson,
  type MembershipInfo,
} from '@catalogsync/core';
import { SyncError } from '../errors/index.js';
import type { IssueLedger } from '../ledger/index.js';
import { addShould, emptyShould } from '../state/index.js';
import type { CatalogPersonRow, PostWithMemberships } from '../types/index.js';
import { throttledLookup, type AssignmentPlan, type Check, type CheckContext } from './context.js';

interface MembershipSubject {
  postId: string;
  postLabel: string;
  membershipId: string;
}

interface ResolvedPerson {
  personId: string;
  personName: string;
}

function isInvalidMembership(err: unknown): boolean {
  if (err instanceof SyncError) return err.code === 'INVALID_MEMBERSHIP' || err.code === 'MISSING_PERSON_LINK';
  return err instanceof ConnectorError && err.code === 'NOT_FOUND';
}

function rowName(row: CatalogPersonRow): string {
  return formatFullName({
    givenName: row.givenName ?? '',
    additionalName: row.additionalName,
    familyName: row.familyName ?? '',
  });
}

function namesDiffer(row: CatalogPersonRow, person: DirectoryPerson): boolean {
  return (
    blankToNull(row.givenName) !== person.givenName ||
    blankToNull(row.additionalName) !== person.additionalName ||
    blankToNull(row.familyName) !== person.familyName
  );
}

async function lookupMembership(
  context: CheckContext,
  ledger: IssueLedger,
  subject: MembershipSubject
): Promise<{ membership: MembershipInfo; person: DirectoryPerson } | undefined> {
  let membership: MembershipInfo;
  try {
    membership = await throttledLookup(context, () => context.directory.getMembership(subject.membershipId));
  } catch (err) {
    if (isInvalidMembership(err)) {
      ledger.open({
        type: 'invalid_membership',
        ...subject,
        message: `Invalid membership id ${subject.membershipId} on post ${subject.postLabel}: ${errorMessage(err)}`,
      });
    } else {
      ledger.open({
        type: 'membership_lookup_failed',
        ...subject,
        error: errorMessage(err),
        message: `Could not look up membership ${subject.membershipId} on post ${subject.postLabel}`,
      });
    }
    return undefined;
  }

  let person: DirectoryPerson;
  try {
    person = await throttledLookup(context, () => context.directory.getPersonById(membership.personId));
  } catch (err) {
    if (err instanceof SyncError && err.code === 'INCOMPLETE_PERSON_DATA') {
      ledger.open({
        type: 'incomplete_person_data',
        ...subject,
        directoryPersonId: membership.personId,
        message: `Directory person ${membership.personId} has no data`,
      });
    } else {
      ledger.open({
        type: 'membership_lookup_failed',
        ...subject,
        error: errorMessage(err),
        message: `Could not look up directory person ${membership.personId} of membership ${subject.membershipId}`,
      });
    }
    return undefined;
  }

  if (!person.givenName || !person.familyName) {
    ledger.open({
      type: 'incomplete_person_data',
      ...subject,
      directoryPersonId: person.personId,
      message: `Directory person ${person.personId} is missing a first or last name`,
    });
    return undefined;
  }

  return { membership, person };
}

/**
 * Make sure the catalog holds the directory person. Returns the catalog person,
 * or undefined when it could not be resolved (an issue is recorded).
 */
async function resolvePerson(
  context: CheckContext,
  ledger: IssueLedger,
  subject: MembershipSubject,
  person: DirectoryPerson & { givenName: string; familyName: string }
): Promise<ResolvedPerson | undefined> {
  const { executor, lookups } = context;
  const skPersonId = person.personId;
  const name = { givenName: person.givenName, additionalName: person.additionalName, familyName: person.familyName };
  const personName = formatFullName(name);

  const existing = await lookups.findByDirectoryId(skPersonId);
  if (existing) {
    if (namesDiffer(existing, person)) {
      const previousName = rowName(existing);
      const result = await executor.updatePersonName(existing.id, name);
      ledger.recordRemediation(
        {
          type: 'person_name_updated',
          personId: existing.id,
          personName,
          skPersonId,
          previousName,
          message: `Renamed person ${previousName} to ${personName}`,
        },
        result
      );
    }
    return { personId: existing.id, personName };
  }

  let personId: string;
  // A namesake already tied to another directory person is a different person
  const namesake = await lookups.findByName(person.givenName, person.familyName, skPersonId);
  if (namesake) {
    personId = namesake.id;
  } else {
    const created = await executor.createPerson({ ...name, skPersonId });
    if (created.status === 'failed') {
      ledger.recordRemediation(
        {
          type: 'person_resolution_failed',
          ...subject,
          error: created.error,
          message: `Could not create person ${personName}`,
        },
        created
      );
      return undefined;
    }
    personId = created.value;
    ledger.recordRemediation(
      {
        type: 'person_created',
        ...subject,
        personId,
        personName,
        skPersonId,
        message: `Created person ${personName} (${context.gateway.personWebUrl(personId)})`,
      },
      created
    );
  }

  const updated = await executor.updatePersonSkId(personId, skPersonId);
  ledger.recordRemediation(
    {
      type: 'person_id_updated',
      personId,
      personName,
      skPersonId,
      previousSkPersonId: updated.status === 'failed' ? (namesake?.skPersonId ?? null) : updated.value,
      message: `Set directory person id of ${personName} to ${skPersonId}`,
    },
    updated
  );
  return { personId, personName };
}

async function syncPost(
  context: CheckContext,
  ledger: IssueLedger,
  post: PostWithMemberships,
  plan: AssignmentPlan
): Promise<void> {
  for (const membershipId of post.membershipIds) {
    const subject: MembershipSubject = { postId: post.postId, postLabel: post.postLabel, membershipId };

    const found = await lookupMembership(context, ledger, subject);
    if (!found) {
      plan.should.unresolvedPosts.add(post.postId);
      continue;
    }
    const { givenName, familyName } = found.person;
    if (!givenName || !familyName) continue;

    let resolved: ResolvedPerson | undefined;
    try {
      resolved = await resolvePerson(context, ledger, subject, { ...found.person, givenName, familyName });
    } catch (err) {
      ledger.open({
        type: 'person_resolution_failed',
        ...subject,
        error: errorMessage(err),
        message: `Could not resolve catalog person for membership ${membershipId}`,
      });
    }

    if (!resolved) {
      plan.should.unresolvedPosts.add(post.postId);
      continue;
    }

    addShould(plan.should, post.postId, resolved.personId);
    plan.personNames.set(resolved.personId, resolved.personName);
    if (context.personMapping && !context.executor.dryRun) {
      context.personMapping.addEntry(found.person.personId, 'Person', resolved.personId, null);
    }
  }
}

export const personSyncCheck: Check = {
  id: 'person-sync',
  title: 'Person sync from the directory',

  async run(context, ledger) {
    const posts = await context.state.listPostsWithMemberships();
    const plan: AssignmentPlan = { should: emptyShould(), postLabels: new Map(), personNames: new Map() };

    context.logger.info('Syncing persons of posts with memberships', { posts: posts.length });
    for (const [index, post] of posts.entries()) {
      context.logger.info(`[${index + 1}/${posts.length}] ${post.postLabel}`, { postId: post.postId });
      plan.postLabels.set(post.postId, post.postLabel);
      await syncPost(context, ledger, post, plan);
    }

    context.shared.assignments = plan;
  },
};
