import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { Token } from '../tokenizers/tokenizer';
import type { SplitSettings } from '../cli/types';
import { log, warn } from './logger';

function plural(count: number, noun: string): string {
  return count === 1 ? `1 ${noun}` : `${count} ${noun}s`;
}

export function formatChunkHeader(index: number, total: number, tokenCount: number, width: number): string {
  const label = ` chunk ${index + 1}/${total} ${chalk.dim('·')} ${chalk.cyan(plural(tokenCount, 'token'))} `;
  const fill = Math.max(2, width - stripAnsi(label).length - 2);
  return `${chalk.dim('──')}${chalk.bold(label)}${chalk.dim('─'.repeat(fill))}`;
}

export function printSourceHeader(source: string) {
  log(chalk.underline(source));
}

export function printChunk(index: number, total: number, text: string, tokenCount: number) {
  const width = Math.min(process.stdout.columns || 80, 100);
  log(formatChunkHeader(index, total, tokenCount, width));
  log(text);
  log('');
}

export function printTokens(tokens: readonly Token[]) {
  const cells = tokens.map((token) => (typeof token === 'number' ? chalk.yellow(String(token)) : JSON.stringify(token)));
  log(cells.join(' '));
}

export function printSplitSummary(chunks: number, tokens: number, settings: SplitSettings) {
  const okMark = chunks > 0 ? chalk.green('✓') : chalk.yellow('!');
  // "X chunks, Y tokens (budget 510, overlap 0, basic tokenizer)."
  log(
    `${okMark} ${plural(chunks, 'chunk')}, ${plural(tokens, 'token')} ` +
      chalk.dim(`(budget ${settings.chunkSize}, overlap ${settings.overlapSize}, ${settings.tokenizer} tokenizer).`)
  );
}

export function printRoundTripSummary(checked: number, mismatches: readonly number[]) {
  if (mismatches.length === 0) {
    log(`${chalk.green('✓')} round trip holds for ${plural(checked, 'chunk')}.`);
    return;
  }
  for (const index of mismatches) {
    warn(`  ${chalk.yellow('warning')}  chunk ${index + 1} does not survive detokenize/tokenize`);
  }
  log(`${chalk.red('✖')} round trip failed for ${mismatches.length} of ${plural(checked, 'chunk')}.`);
}
