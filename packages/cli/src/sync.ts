/**
 * Wires clients, caches and stores from a validated configuration and runs
 * the selected checks.
 */

import {
  BearerTokenAuth,
  CatalogClient,
  ClientCredentialsAuth,
  DirectoryClient,
  HttpClient,
  type FetchFn,
  type HttpClientConfig,
  type IAuthProvider,
} from '@catalogsync/connector-api';
import { errorMessage, type Logger } from '@catalogsync/core';
import { PersistedMappingStore } from '@catalogsync/mapping-store';
import {
  AuditTrail,
  ReportStore,
  createCheckContext,
  runChecks,
  type CheckId,
  type CheckStatus,
  type RunReport,
} from '@catalogsync/sync-core';
import type { CatalogAuthConfig, ConfigFile } from './config.js';

export interface SyncOptions {
  checks: readonly CheckId[];
  dryRun: boolean;
  logger: Logger;
  /** Replaces the global fetch for every client */
  fetch?: FetchFn;
  now?: () => Date;
}

export interface SyncOutcome {
  report: RunReport;
  reportPath: string;
  /** Set when the person mapping could not be loaded or saved */
  mappingError?: string;
}

/** Id space of the directory person ids kept in the mapping file */
export const PERSON_ID_SPACE = 'directory-person';

function createCatalogAuth(auth: CatalogAuthConfig, http: HttpClient): IAuthProvider {
  switch (auth.type) {
    case 'bearer':
      return new BearerTokenAuth(auth.token);
    case 'client_credentials':
      return new ClientCredentialsAuth(
        {
          tokenUrl: auth.tokenUrl,
          clientId: auth.clientId,
          clientSecret: auth.clientSecret,
          scope: auth.scope,
        },
        http
      );
  }
}

export function exitCodeFor(status: CheckStatus, mappingError?: string): number {
  return status === 'error' || mappingError !== undefined ? 1 : 0;
}

export async function runSync(config: ConfigFile, options: SyncOptions): Promise<SyncOutcome> {
  const { logger } = options;
  const httpDefaults: Omit<HttpClientConfig, 'source'> = {
    timeoutMs: config.http.timeoutMs,
    rateLimitDelayMs: config.http.rateLimitDelayMs,
    retry: config.http.retry,
    fetch: options.fetch,
    logger,
  };

  const catalogAuth = createCatalogAuth(
    config.catalog.auth,
    new HttpClient({ ...httpDefaults, source: 'catalog-auth' })
  );
  const catalog = new CatalogClient(
    {
      baseUrl: config.catalog.baseUrl,
      database: config.catalog.database,
      reviewStatus: config.catalog.reviewStatus,
    },
    new HttpClient({ ...httpDefaults, source: 'catalog', auth: catalogAuth })
  );
  const directory = new DirectoryClient(
    { baseUrl: config.directory.baseUrl, accessKey: config.directory.accessKey },
    new HttpClient({ ...httpDefaults, source: 'directory' })
  );

  const personMapping = new PersistedMappingStore({
    directory: config.run.mappingDir,
    database: config.catalog.database,
    scheme: 'persons',
    idSpace: PERSON_ID_SPACE,
    logger,
  });
  let mappingError: string | undefined;
  let mappingLoaded = true;
  try {
    await personMapping.load();
  } catch (error) {
    mappingError = errorMessage(error);
    mappingLoaded = false;
    logger.warn('Running without the person mapping', { file: personMapping.filePath, error });
  }

  const context = createCheckContext({
    gateway: catalog,
    directory,
    directoryWebBaseUrl: config.directory.webBaseUrl,
    interCallDelayMs: config.run.interCallDelayMs,
    personMapping: mappingLoaded ? personMapping : undefined,
    audit: config.run.auditDir ? new AuditTrail(config.run.auditDir, { logger }) : undefined,
    dryRun: options.dryRun,
    logger,
  });

  logger.info('Starting catalog sync', {
    database: catalog.database,
    checks: options.checks,
    dryRun: options.dryRun,
  });

  const report = await runChecks(context, { checks: options.checks, now: options.now });

  const reportPath = await new ReportStore(config.run.reportDir).save(report);

  if (mappingLoaded && !options.dryRun && personMapping.isDirty) {
    try {
      await personMapping.save();
      logger.info('Saved person mapping', { file: personMapping.filePath, entries: personMapping.size });
    } catch (error) {
      mappingError = errorMessage(error);
      logger.error('Failed to save person mapping', { file: personMapping.filePath, error });
    }
  }

  logger.info('Catalog sync finished', {
    status: report.summary.overallStatus,
    issues: report.summary.totalIssues,
    report: reportPath,
  });

  return { report, reportPath, mappingError };
}
