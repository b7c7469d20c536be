import { CHECK_IDS, type CheckId } from '@catalogsync/sync-core';
import { ConfigError } from './config.js';

export interface CliArgs {
  configPath: string | null;
  /** Overrides run.checks from the config */
  checks?: CheckId[];
  dryRun: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: catalog-sync --config <config.json> [--checks id,id] [--dry-run]',
  '',
  `Checks: ${CHECK_IDS.join(', ')}`,
].join('\n');

function isCheckId(value: string): value is CheckId {
  return CHECK_IDS.some((id) => id === value);
}

function parseCheckList(raw: string): CheckId[] {
  const ids: CheckId[] = [];
  for (const part of raw.split(',')) {
    const id = part.trim();
    if (!id) continue;
    if (!isCheckId(id)) {
      throw new ConfigError(`Unknown check id: ${id}`);
    }
    if (!ids.includes(id)) ids.push(id);
  }
  if (ids.length === 0) {
    throw new ConfigError('--checks needs at least one check id');
  }
  return ids;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { configPath: null, dryRun: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config': {
        const value = argv[++i];
        if (!value) throw new ConfigError('--config needs a file path');
        args.configPath = value;
        break;
      }
      case '--checks': {
        const value = argv[++i];
        if (!value) throw new ConfigError('--checks needs a comma-separated list');
        args.checks = parseCheckList(value);
        break;
      }
      case '--dry-run':
        args.dryRun = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
