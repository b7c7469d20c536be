#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   catalog-sync --config ./config.json [--checks person-sync,post-assignment] [--dry-run]
 */

import { Logger } from '@catalogsync/core';
import { formatRunReport } from '@catalogsync/sync-core';
import { USAGE, parseArgs } from './args.js';
import { ConfigError, loadConfig } from './config.js';
import { exitCodeFor, runSync } from './sync.js';

async function main(): Promise<number> {
  let logger = new Logger();

  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help || !args.configPath) {
      console.error(USAGE);
      return args.help ? 0 : 1;
    }

    const config = await loadConfig(args.configPath);
    logger = new Logger({ level: config.logging.level, format: config.logging.format });

    const { report, mappingError } = await runSync(config, {
      checks: args.checks ?? config.run.checks,
      dryRun: args.dryRun || config.run.dryRun,
      logger,
    });

    process.stdout.write(`${formatRunReport(report)}\n`);
    if (mappingError) {
      process.stdout.write(`\nPerson mapping: ${mappingError}\n`);
    }
    return exitCodeFor(report.summary.overallStatus, mappingError);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error('');
      console.error(USAGE);
    } else {
      logger.error('Catalog sync failed', { error });
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
