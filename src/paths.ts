/**
 * Centralized path resolution for fmgw.
 *
 * All config and data files live under ~/.fmgw/ by default.
 * Override with FMGW_HOME env var (useful for tests).
 *
 * Layout:
 *   ~/.fmgw/
 *     fmgw.yaml     main config
 *     .env          API keys for the openai provider
 *     data/
 *       fmgw.log    JSONL debug log
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/** Root directory for all fmgw files. */
export function fmgwHome(): string {
  return process.env.FMGW_HOME || join(homedir(), '.fmgw');
}

/** Path to fmgw.yaml config file. */
export function configPath(): string {
  return join(fmgwHome(), 'fmgw.yaml');
}

/** Path to .env file. */
export function envPath(): string {
  return join(fmgwHome(), '.env');
}

/** Path to the data subdirectory. */
export function dataDir(): string {
  return join(fmgwHome(), 'data');
}

/** Resolve a file path under the data directory. */
export function dataFile(...segments: string[]): string {
  return join(dataDir(), ...segments);
}

export function logPath(): string {
  return dataFile('fmgw.log');
}
