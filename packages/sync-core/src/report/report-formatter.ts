/**
 * Run Report Formatter
 *
 * Markdown summary of a run: one section per check with the issues that still
 * need attention.
 */

import { countIssues } from '../ledger/index.js';
import { issueState, type CheckStatus, type Issue, type RunReport } from '../types/index.js';

const STATUS_LABEL: Record<CheckStatus, string> = {
  success: 'OK',
  warning: 'WARNING',
  error: 'ERROR',
};

function formatIssue(issue: Issue): string {
  const state = issueState(issue) === 'unresolved' ? 'failed' : 'open';
  return `- [${state}] ${issue.message}`;
}

export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Catalog Sync Report`);
  lines.push(`Database: ${report.database}${report.dryRun ? ' (dry run)' : ''}`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push(`Status: ${STATUS_LABEL[summary.overallStatus]}`);
  lines.push('');

  lines.push(`### Summary`);
  lines.push(`- Checks: ${summary.totalChecks} (${summary.successful} ok, ${summary.warnings} warnings, ${summary.errors} errors)`);
  lines.push(`- Issues: ${summary.totalIssues}`);
  lines.push(`- Automatically fixed: ${summary.remediatedIssues}`);
  lines.push(`- Requiring attention: ${summary.actualIssues}`);
  lines.push('');

  for (const check of report.checks) {
    lines.push(`### #${check.number} ${check.title} [${STATUS_LABEL[check.status]}]`);
    lines.push(check.message);

    const pending = check.issues.filter((issue) => issueState(issue) !== 'remediated');
    const { remediated } = countIssues(check.issues);
    for (const issue of pending.slice(0, 50)) {
      lines.push(formatIssue(issue));
    }
    if (pending.length > 50) {
      lines.push(`... and ${pending.length - 50} more`);
    }
    if (remediated > 0) {
      lines.push(`(${remediated} fixed automatically)`);
    }
    lines.push('');
  }

  lines.push(`---`);
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
