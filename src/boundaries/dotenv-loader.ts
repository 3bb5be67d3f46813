import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { DOTENV_FILENAMES } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';

/*
 * Loads variables from the first .env or .env.local file found in `cwd`.
 * Variables already present in `env` win over the file.
 */
export function loadDotEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const filename of DOTENV_FILENAMES) {
    const full = path.resolve(cwd, filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || match[2] === undefined) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
      return full;
    } catch (e: unknown) {
      // unreadable file: warn and keep the variables already set
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`[tokensplit] Warning: ${err.message}`);
    }
  }
  return undefined;
}
