/**
 * Run Orchestration
 *
 * Runs the selected checks one after another. A check that throws is reported
 * with status error; the remaining checks still run.
 */

import { createRunId, errorMessage } from '@catalogsync/core';
import { IssueLedger, aggregateRun, checkMessage, checkStatus } from '../ledger/index.js';
import { CHECK_IDS, type CheckId, type CheckResult, type RunReport } from '../types/index.js';
import type { Check, CheckContext } from './context.js';
import { contactDetailsCheck } from './contact-details.js';
import { personSyncCheck } from './person-sync.js';
import { postAssignmentCheck } from './post-assignment.js';
import { postOccupationCheck } from './post-occupation.js';
import { uniquePersonIdCheck } from './unique-person-id.js';
import { userAccountsCheck } from './user-accounts.js';

export const CHECKS: Record<CheckId, Check> = {
  'unique-person-id': uniquePersonIdCheck,
  'person-sync': personSyncCheck,
  'post-assignment': postAssignmentCheck,
  'post-occupation': postOccupationCheck,
  'user-accounts': userAccountsCheck,
  'contact-details': contactDetailsCheck,
};

export interface RunOptions {
  /** Checks to run (default: all); they always run in catalog order */
  checks?: readonly CheckId[];
  now?: () => Date;
}

export function checkNumber(id: CheckId): number {
  return CHECK_IDS.indexOf(id) + 1;
}

export async function runCheck(check: Check, context: CheckContext): Promise<CheckResult> {
  const number = checkNumber(check.id);
  const logger = context.logger.child({ check: check.id });
  const ledger = new IssueLedger();
  const startTime = Date.now();

  logger.info(`Starting check #${number}: ${check.title}`);
  let error: string | undefined;
  try {
    await check.run({ ...context, logger }, ledger);
  } catch (err) {
    error = errorMessage(err);
    logger.error(`Check #${number} failed`, { error: err });
  }

  const issues = [...ledger.issues];
  const status = checkStatus(issues, error !== undefined);
  const result: CheckResult = {
    id: check.id,
    number,
    title: check.title,
    status,
    message: error !== undefined ? `Error in Check #${number} (${check.title}): ${error}` : checkMessage(number, issues),
    issues,
    ...(error !== undefined ? { error } : {}),
    processingTimeMs: Date.now() - startTime,
  };

  logger.info(result.message, { status });
  return result;
}

export async function runChecks(context: CheckContext, options: RunOptions = {}): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const selected = new Set<CheckId>(options.checks ?? CHECK_IDS);
  const timestamp = now();
  const startTime = Date.now();

  const checks: CheckResult[] = [];
  for (const id of CHECK_IDS) {
    if (!selected.has(id)) continue;
    checks.push(await runCheck(CHECKS[id], context));
  }

  return {
    id: createRunId(),
    timestamp,
    database: context.gateway.database,
    dryRun: context.executor.dryRun,
    summary: aggregateRun(checks),
    checks,
    processingTimeMs: Date.now() - startTime,
  };
}
