/**
 * Minimal .env loader for fmgw.
 *
 * Reads key=value pairs from ~/.fmgw/.env into process.env.
 * Safe to call multiple times; skips keys already set in the environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import { envPath } from './paths.js';

/** Parse .env text into ordered key/value pairs. Comments and malformed lines are skipped. */
export function parseDotEnv(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let val = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (key) pairs.push([key, val]);
  }
  return pairs;
}

export function loadDotEnv(path = envPath()): void {
  if (!existsSync(path)) return;
  for (const [key, val] of parseDotEnv(readFileSync(path, 'utf-8'))) {
    // Don't override existing env vars
    if (process.env[key] === undefined) {
      process.env[key] = val;
    }
  }
}
