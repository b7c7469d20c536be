import type { CheckResult, CheckStatus, RunSummary } from '../types/index.js';
import { countIssues } from './issue-ledger.js';

const SEVERITY: Record<CheckStatus, number> = { success: 0, warning: 1, error: 2 };

export function worstStatus(statuses: Iterable<CheckStatus>): CheckStatus {
  let worst: CheckStatus = 'success';
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) worst = status;
  }
  return worst;
}

export function aggregateRun(results: readonly CheckResult[]): RunSummary {
  const issues = results.flatMap((result) => result.issues);
  const { total, remediated, actual } = countIssues(issues);

  return {
    totalChecks: results.length,
    successful: results.filter((result) => result.status === 'success').length,
    warnings: results.filter((result) => result.status === 'warning').length,
    errors: results.filter((result) => result.status === 'error').length,
    totalIssues: total,
    remediatedIssues: remediated,
    actualIssues: actual,
    overallStatus: worstStatus(results.map((result) => result.status)),
  };
}
