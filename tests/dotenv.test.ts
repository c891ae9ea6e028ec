import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadDotEnv, parseDotEnv } from '../src/dotenv.js';

describe('parseDotEnv', () => {
  test('reads key=value pairs in order', () => {
    expect(parseDotEnv('A=1\nB=two\n')).toEqual([['A', '1'], ['B', 'two']]);
  });

  test('skips comments, blank and malformed lines', () => {
    expect(parseDotEnv('# comment\n\nNOT_A_PAIR\n=value\nKEY=v\n')).toEqual([['KEY', 'v']]);
  });

  test('strips matching quotes and surrounding whitespace', () => {
    expect(parseDotEnv(`A = "quoted value"\nB='single'\nC="unbalanced`)).toEqual([
      ['A', 'quoted value'],
      ['B', 'single'],
      ['C', '"unbalanced'],
    ]);
  });

  test('keeps = inside values', () => {
    expect(parseDotEnv('URL=http://x/?a=b')).toEqual([['URL', 'http://x/?a=b']]);
  });
});

describe('loadDotEnv', () => {
  let dir: string;
  const keys = ['FMGW_DOTENV_NEW', 'FMGW_DOTENV_SET'];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fmgw-dotenv-'));
    for (const k of keys) delete process.env[k];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const k of keys) delete process.env[k];
  });

  test('loads unset keys without overriding existing ones', () => {
    const path = join(dir, '.env');
    writeFileSync(path, 'FMGW_DOTENV_NEW=from-file\nFMGW_DOTENV_SET=from-file\n');
    process.env.FMGW_DOTENV_SET = 'from-env';

    loadDotEnv(path);

    expect(process.env.FMGW_DOTENV_NEW).toBe('from-file');
    expect(process.env.FMGW_DOTENV_SET).toBe('from-env');
  });

  test('a missing file is a no-op', () => {
    expect(() => loadDotEnv(join(dir, 'missing.env'))).not.toThrow();
    expect(process.env.FMGW_DOTENV_NEW).toBeUndefined();
  });
});
