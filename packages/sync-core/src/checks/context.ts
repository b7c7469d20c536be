/**
 * Check Context
 *
 * Everything a check reads from or writes through, built once per run.
 */

import {
  silentLogger,
  sleep,
  type ICatalogGateway,
  type IDirectoryGateway,
  type IMappingStore,
  type Logger,
} from '@catalogsync/core';
import type { AuditTrail } from '../audit/index.js';
import { DirectoryCache, PersonLookupCache } from '../cache/index.js';
import type { IssueLedger } from '../ledger/index.js';
import { RemediationExecutor } from '../remediation/index.js';
import { QueryCatalogState, type CatalogState } from '../state/index.js';
import type { AssignmentShould, CheckId } from '../types/index.js';

/** Person sync output consumed by post assignment */
export interface AssignmentPlan {
  should: AssignmentShould;
  postLabels: Map<string, string>;
  /** catalog person id → display name */
  personNames: Map<string, string>;
}

export interface CheckContext {
  gateway: ICatalogGateway;
  state: CatalogState;
  directory: DirectoryCache;
  lookups: PersonLookupCache;
  executor: RemediationExecutor;
  /** Base URL of the directory's public web pages */
  directoryWebBaseUrl: string;
  /** Pause after each directory round trip */
  interCallDelayMs: number;
  /** Records directory person id → catalog person, when set */
  personMapping?: IMappingStore;
  logger: Logger;
  /** Results handed from one check to a later one in the same run */
  shared: { assignments?: AssignmentPlan };
}

export interface Check {
  id: CheckId;
  title: string;
  run(context: CheckContext, ledger: IssueLedger): Promise<void>;
}

export interface CheckContextOptions {
  gateway: ICatalogGateway;
  directory: IDirectoryGateway;
  directoryWebBaseUrl: string;
  state?: CatalogState;
  interCallDelayMs?: number;
  personMapping?: IMappingStore;
  audit?: AuditTrail;
  dryRun?: boolean;
  logger?: Logger;
}

export function createCheckContext(options: CheckContextOptions): CheckContext {
  const logger = options.logger ?? silentLogger;
  const state = options.state ?? new QueryCatalogState(options.gateway);
  const lookups = new PersonLookupCache(state, { logger });

  return {
    gateway: options.gateway,
    state,
    directory: new DirectoryCache(options.directory, { logger }),
    lookups,
    executor: new RemediationExecutor({
      gateway: options.gateway,
      lookups,
      audit: options.audit,
      logger,
      dryRun: options.dryRun,
    }),
    directoryWebBaseUrl: options.directoryWebBaseUrl,
    interCallDelayMs: options.interCallDelayMs ?? 1000,
    personMapping: options.personMapping,
    logger,
    shared: {},
  };
}

/**
 * Run a directory lookup and pause afterwards if it went to the network.
 * Cache hits are not delayed.
 */
export async function throttledLookup<T>(context: CheckContext, lookup: () => Promise<T>): Promise<T> {
  const before = context.directory.stats().networkCalls;
  try {
    return await lookup();
  } finally {
    if (context.directory.stats().networkCalls > before) {
      await sleep(context.interCallDelayMs);
    }
  }
}
