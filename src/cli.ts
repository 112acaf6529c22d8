/**
 * Adoption Radar: Command Line Options
 */

import { ListIdSchema } from './types';
import type { ListId } from './types';
import { RunAbortError } from './lib/errors';

export interface CliOptions {
  list?: ListId;
  skipReports: boolean;
  dryRun: boolean;
  store?: 'file' | 'supabase';
  configPath: string;
}

export const DEFAULT_CATALOG_PATH = 'config/technologies.json';

export const USAGE = `Usage: npm run pipeline -- [options]

  --list <enterprise|fintech>   Run a single list (no comparison)
  --skip-reports                Do not write reports
  --dry-run                     Do not persist the snapshot
  --store <file|supabase>       Snapshot store (overrides SNAPSHOT_STORE)
  --config <path>               Technology catalog (default: ${DEFAULT_CATALOG_PATH})`;

function valueOf(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new RunAbortError(`${flag} needs a value`);
  }
  return value;
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    skipReports: false,
    dryRun: false,
    configPath: DEFAULT_CATALOG_PATH,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--list') {
      const parsed = ListIdSchema.safeParse(valueOf(args, i, arg));
      if (!parsed.success) {
        throw new RunAbortError(`--list must be one of ${ListIdSchema.options.join(', ')}`);
      }
      options.list = parsed.data;
      i++;
    } else if (arg === '--store') {
      const value = valueOf(args, i, arg);
      if (value !== 'file' && value !== 'supabase') {
        throw new RunAbortError('--store must be file or supabase');
      }
      options.store = value;
      i++;
    } else if (arg === '--config') {
      options.configPath = valueOf(args, i, arg);
      i++;
    } else if (arg === '--skip-reports') {
      options.skipReports = true;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else {
      throw new RunAbortError(`unknown option ${arg}`);
    }
  }

  return options;
}
