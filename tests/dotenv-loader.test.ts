import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { loadDotEnv } from '../src/boundaries/dotenv-loader';

describe('loadDotEnv', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'tokensplit-env-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads variables without overriding ones already set', () => {
    writeFileSync(
      path.join(tempDir, '.env'),
      [
        '# local defaults',
        'TOKENSPLIT_TOKENIZER=gpt',
        'TOKENSPLIT_CHUNK_SIZE="64"',
        'TOKENSPLIT_OVERLAP_SIZE=8 # tokens',
        'not a variable',
      ].join('\n')
    );
    const env: NodeJS.ProcessEnv = { TOKENSPLIT_TOKENIZER: 'basic' };

    expect(loadDotEnv(tempDir, env)).toBe(path.resolve(tempDir, '.env'));
    expect(env).toEqual({
      TOKENSPLIT_TOKENIZER: 'basic',
      TOKENSPLIT_CHUNK_SIZE: '64',
      TOKENSPLIT_OVERLAP_SIZE: '8',
    });
  });

  it('falls back to .env.local', () => {
    writeFileSync(path.join(tempDir, '.env.local'), "TOKENSPLIT_TOKENIZER='character'\n");
    const env: NodeJS.ProcessEnv = {};

    expect(loadDotEnv(tempDir, env)).toBe(path.resolve(tempDir, '.env.local'));
    expect(env.TOKENSPLIT_TOKENIZER).toBe('character');
  });

  it('returns undefined when there is no env file', () => {
    const env: NodeJS.ProcessEnv = {};

    expect(loadDotEnv(tempDir, env)).toBeUndefined();
    expect(env).toEqual({});
  });
});
