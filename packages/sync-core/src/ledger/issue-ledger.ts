/**
 * Issue Ledger
 *
 * Collects the issues of one check and derives its status and message.
 */

import type { RemediationResult } from '../remediation/index.js';
import { issueState, type CheckStatus, type Issue, type IssueDetails } from '../types/index.js';

export interface IssueCounts {
  total: number;
  remediated: number;
  /** total − remediated */
  actual: number;
}

export class IssueLedger {
  private readonly entries: Issue[] = [];

  get issues(): readonly Issue[] {
    return this.entries;
  }

  /** Record an issue that needs manual action */
  open(details: IssueDetails): Issue {
    const issue: Issue = { ...details, remediationAttempted: false, remediationSuccess: false };
    this.entries.push(issue);
    return issue;
  }

  /**
   * Record the outcome of a remediation. An unchanged result means there was
   * nothing to fix and records nothing.
   */
  recordRemediation<T>(details: IssueDetails, result: RemediationResult<T>): Issue | undefined {
    if (result.status === 'unchanged') return undefined;

    const issue: Issue =
      result.status === 'applied'
        ? { ...details, remediationAttempted: true, remediationSuccess: true }
        : {
            ...details,
            message: `${details.message} (failed: ${result.error})`,
            remediationAttempted: true,
            remediationSuccess: false,
          };
    this.entries.push(issue);
    return issue;
  }

  counts(): IssueCounts {
    return countIssues(this.entries);
  }
}

export function countIssues(issues: readonly Issue[]): IssueCounts {
  const remediated = issues.filter((issue) => issueState(issue) === 'remediated').length;
  return { total: issues.length, remediated, actual: issues.length - remediated };
}

/** error when the check threw, warning while anything is left unremediated */
export function checkStatus(issues: readonly Issue[], failed: boolean): CheckStatus {
  if (failed) return 'error';
  return countIssues(issues).actual > 0 ? 'warning' : 'success';
}

export function checkMessage(checkNumber: number, issues: readonly Issue[]): string {
  const { total, remediated, actual } = countIssues(issues);
  if (total === 0) return `Check #${checkNumber}: No issues found`;
  return `Check #${checkNumber}: Found ${total} issue(s) (${remediated} automatically fixed, ${actual} requiring attention)`;
}
