import { describe, expect, it } from 'vitest';
import { IssueLedger, aggregateRun, checkMessage, checkStatus } from '../src/ledger/index.js';
import { issueState, type CheckResult, type IssueDetails } from '../src/types/index.js';

const unoccupied: IssueDetails = {
  type: 'unoccupied_post',
  postId: 'p1',
  postLabel: 'Vacant',
  message: 'Post Vacant has no holder',
};

const added: IssueDetails = {
  type: 'assignment_added',
  postId: 'p2',
  postLabel: 'Chair',
  personId: 'a',
  personName: 'Anna Beispiel',
  message: 'Assigned Anna Beispiel to post Chair',
};

function result(overrides: Partial<CheckResult>): CheckResult {
  return {
    id: 'person-sync',
    number: 2,
    title: 'Person sync from the directory',
    status: 'success',
    message: '',
    issues: [],
    processingTimeMs: 0,
    ...overrides,
  };
}

describe('IssueLedger', () => {
  it('tracks the remediation state of each issue', () => {
    const ledger = new IssueLedger();

    const open = ledger.open(unoccupied);
    const fixed = ledger.recordRemediation(added, { status: 'applied', value: ['p2'] });
    const failed = ledger.recordRemediation(added, { status: 'failed', error: 'HTTP 500' });
    const nothing = ledger.recordRemediation(added, { status: 'unchanged', value: ['p2'] });

    expect(issueState(open)).toBe('open');
    expect(fixed && issueState(fixed)).toBe('remediated');
    expect(failed && issueState(failed)).toBe('unresolved');
    expect(failed?.message).toBe('Assigned Anna Beispiel to post Chair (failed: HTTP 500)');
    expect(nothing).toBeUndefined();
    expect(ledger.counts()).toEqual({ total: 3, remediated: 1, actual: 2 });
  });

  it('derives status and message from the issues', () => {
    const ledger = new IssueLedger();
    expect(checkStatus(ledger.issues, false)).toBe('success');
    expect(checkMessage(4, ledger.issues)).toBe('Check #4: No issues found');

    ledger.recordRemediation(added, { status: 'applied', value: [] });
    expect(checkStatus(ledger.issues, false)).toBe('success');
    expect(checkMessage(3, ledger.issues)).toBe('Check #3: Found 1 issue(s) (1 automatically fixed, 0 requiring attention)');

    ledger.open(unoccupied);
    expect(checkStatus(ledger.issues, false)).toBe('warning');
    expect(checkStatus(ledger.issues, true)).toBe('error');
  });
});

describe('aggregateRun', () => {
  it('counts issues and reports the worst status', () => {
    const remediated = { ...added, remediationAttempted: true, remediationSuccess: true };
    const open = { ...unoccupied, remediationAttempted: false, remediationSuccess: false };

    const summary = aggregateRun([
      result({ status: 'success', issues: [remediated] }),
      result({ status: 'warning', issues: [open, remediated] }),
      result({ status: 'error', error: 'boom' }),
    ]);

    expect(summary).toEqual({
      totalChecks: 3,
      successful: 1,
      warnings: 1,
      errors: 1,
      totalIssues: 3,
      remediatedIssues: 2,
      actualIssues: 1,
      overallStatus: 'error',
    });
  });

  it('is success for an empty run', () => {
    expect(aggregateRun([]).overallStatus).toBe('success');
  });
});
