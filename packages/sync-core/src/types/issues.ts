/**
 * Issue records produced by reconciliation checks
 *
 * One variant per discrepancy kind. Each carries only the subject ids relevant
 * to it plus the remediation outcome flags.
 */

import type { AccessLevel } from '@catalogsync/core';
import type { ContactDifference } from './state.js';

interface PostSubject {
  postId: string;
  postLabel: string;
}

interface PersonSubject {
  personId: string;
  personName: string;
}

export type IssueDetails =
  /** Two or more persons carry the same directory id */
  | { type: 'duplicate_person_id'; message: string; skPersonId: string; personIds: string[]; personNames: string[] }
  | ({ type: 'invalid_membership'; message: string; membershipId: string } & PostSubject)
  | ({ type: 'membership_lookup_failed'; message: string; membershipId: string; error: string } & PostSubject)
  | ({ type: 'incomplete_person_data'; message: string; membershipId: string; directoryPersonId: string } & PostSubject)
  | ({ type: 'person_resolution_failed'; message: string; membershipId: string; error: string } & PostSubject)
  | ({ type: 'person_created'; message: string; membershipId: string; skPersonId: string } & PostSubject & PersonSubject)
  | ({ type: 'person_name_updated'; message: string; skPersonId: string; previousName: string } & PersonSubject)
  | ({ type: 'person_id_updated'; message: string; skPersonId: string; previousSkPersonId: string | null } & PersonSubject)
  | ({ type: 'assignment_added'; message: string } & PostSubject & PersonSubject)
  | ({ type: 'assignment_removed'; message: string } & PostSubject & PersonSubject)
  | ({ type: 'unoccupied_post'; message: string } & PostSubject)
  | ({ type: 'person_missing_email'; message: string; skPersonId: string } & PersonSubject)
  | ({ type: 'user_created'; message: string; email: string; accessLevel: AccessLevel } & PersonSubject)
  | ({ type: 'user_link_updated'; message: string; userId: string; email: string; previousLink: string | null } & PersonSubject)
  | ({
      type: 'access_level_updated';
      message: string;
      userId: string;
      email: string;
      from: AccessLevel;
      to: AccessLevel;
    } & PersonSubject)
  | { type: 'missing_person_name'; message: string; personId: string; skPersonId: string }
  | ({
      type: 'contact_details_updated';
      message: string;
      skPersonId: string;
      differences: ContactDifference[];
    } & PersonSubject)
  | ({ type: 'directory_person_unavailable'; message: string; skPersonId: string; error: string } & PersonSubject);

export interface RemediationFlags {
  remediationAttempted: boolean;
  remediationSuccess: boolean;
}

export type Issue = IssueDetails & RemediationFlags;

export type IssueType = Issue['type'];

/**
 * open: not attempted (manual action needed)
 * remediated: attempted and succeeded
 * unresolved: attempted and failed
 */
export type IssueState = 'open' | 'remediated' | 'unresolved';

export function issueState(issue: RemediationFlags): IssueState {
  if (!issue.remediationAttempted) return 'open';
  return issue.remediationSuccess ? 'remediated' : 'unresolved';
}
