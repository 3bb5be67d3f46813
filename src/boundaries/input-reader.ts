import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { InputError, handleUnknownError } from '../errors/index';

export const STDIN_SOURCE = '<stdin>';

export interface InputText {
  source: string;
  text: string;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of stream) {
    parts.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(parts).toString('utf-8');
}

/**
 * Reads the text to split from `file`, or from `stdin` when no file (or "-")
 * is given. An interactive terminal on stdin counts as no input.
 */
export async function readInput(
  file: string | undefined,
  cwd: string,
  stdin: NodeJS.ReadableStream
): Promise<InputText> {
  if (!file || file === '-') {
    if ('isTTY' in stdin && stdin.isTTY === true) {
      throw new InputError('No input: pass a file or pipe text on stdin', STDIN_SOURCE);
    }
    try {
      return { source: STDIN_SOURCE, text: await readStream(stdin) };
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading stdin');
      throw new InputError(`Failed to read stdin: ${err.message}`, STDIN_SOURCE);
    }
  }

  const fullPath = path.resolve(cwd, file);
  if (!existsSync(fullPath)) {
    throw new InputError(`Input file not found: ${file}`, file);
  }

  try {
    return { source: path.relative(cwd, fullPath) || file, text: readFileSync(fullPath, 'utf-8') };
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading input file');
    throw new InputError(`Failed to read ${file}: ${err.message}`, file);
  }
}
