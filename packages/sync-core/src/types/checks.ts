import type { Issue } from './issues.js';

export const CHECK_IDS = [
  'unique-person-id',
  'person-sync',
  'post-assignment',
  'post-occupation',
  'user-accounts',
  'contact-details',
] as const;

export type CheckId = (typeof CHECK_IDS)[number];

export type CheckStatus = 'success' | 'warning' | 'error';

export interface CheckResult {
  id: CheckId;
  /** Fixed check number, 1-6 */
  number: number;
  title: string;
  status: CheckStatus;
  message: string;
  issues: Issue[];
  /** Set when the check body threw */
  error?: string;
  processingTimeMs: number;
}

export interface RunSummary {
  totalChecks: number;
  successful: number;
  warnings: number;
  errors: number;
  totalIssues: number;
  remediatedIssues: number;
  /** total − remediated */
  actualIssues: number;
  overallStatus: CheckStatus;
}

export interface RunReport {
  id: string;
  timestamp: Date;
  database: string;
  dryRun: boolean;
  summary: RunSummary;
  checks: CheckResult[];
  processingTimeMs: number;
}
