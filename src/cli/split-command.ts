import type { Command } from 'commander';
import { loadConfig, parseEnvironment, parseSplitOptions, readInput, type InputText } from '../boundaries/index';
import { resolveSettings } from '../config/config';
import { handleUnknownError } from '../errors/index';
import { JsonFormatter } from '../output/json-formatter';
import { debug, error, setSilentMode, warn } from '../output/logger';
import { printChunk, printRoundTripSummary, printSourceHeader, printSplitSummary } from '../output/reporter';
import { RecursiveTokenSplitter } from '../splitting/recursive-token-splitter';
import { verifyRoundTrip } from '../splitting/round-trip';
import type { SplitResult } from '../splitting/types';
import type { SplitCommandOptions } from '../schemas/cli-schemas';
import type { Token } from '../tokenizers/tokenizer';
import { createTokenizer } from '../tokenizers/tokenizer-factory';
import { OutputFormat, type CommandIO, type SplitSettings } from './types';

/*
 * Registers the 'split' command with Commander.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split text into chunks that fit a token budget')
    .argument('[file]', 'Input file; reads stdin when omitted or "-"')
    .option('-c, --chunk-size <n>', 'Maximum tokens per chunk (capped at 510)')
    .option('-o, --overlap <n>', 'Tokens to carry from the end of one chunk into the next')
    .option('-t, --tokenizer <type>', 'Tokenizer: basic, character, gpt')
    .option('--lowercase', 'Lowercase tokens (basic tokenizer only)')
    .option('--output <format>', 'Output format: line, json', 'line')
    .option('--verify', 'Check that each chunk survives detokenize/tokenize', false)
    .option('--config <path>', 'Path to a config file (defaults to .tokensplit.ini)')
    .option('-v, --verbose', 'Log separator decisions', false)
    .action(async (file: string | undefined, rawOpts: unknown) => {
      const code = await executeSplit(file, rawOpts, {
        cwd: process.cwd(),
        env: process.env,
        stdin: process.stdin,
      });
      process.exit(code);
    });
}

export async function executeSplit(file: string | undefined, rawOpts: unknown, io: CommandIO): Promise<number> {
  let settings: SplitSettings;
  let options: SplitCommandOptions;
  try {
    options = parseSplitOptions(rawOpts);
    setSilentMode(options.output === OutputFormat.Json);
    settings = resolveSettings({
      cli: options,
      env: parseEnvironment(io.env),
      file: loadConfig(io.cwd, options.config),
    });
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Resolving split settings');
    error(`Error: ${err.message}`);
    return 1;
  }

  let input: InputText;
  try {
    input = await readInput(file, io.cwd, io.stdin);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading input');
    error(`Error: ${err.message}`);
    return 1;
  }

  const tokenizer = createTokenizer(settings.tokenizer, { lowercase: settings.lowercase });
  const splitter = new RecursiveTokenSplitter(tokenizer, { debug: options.verbose });

  let result: SplitResult<Token>;
  try {
    result = splitter.split(input.text, { chunkSize: settings.chunkSize, overlapSize: settings.overlapSize });
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Splitting input');
    error(`Error: ${err.message}`);
    return 1;
  }

  if (result.chunkTokens === undefined) {
    if (input.text) {
      error(
        `Error: ${input.source} cannot be split within a budget of ${settings.chunkSize} tokens; ` +
          'even a single character exceeds it. Increase --chunk-size.'
      );
      return 1;
    }
    warn(`[tokensplit] Warning: ${input.source} is empty`);
  }
  const chunkTokens = result.chunkTokens ?? [];

  const report = options.verify ? verifyRoundTrip(tokenizer, chunkTokens) : undefined;
  const mismatchIndexes = report ? report.mismatches.map((m) => m.index) : [];
  if (options.verbose && report) {
    debug(`verified ${report.checked} chunk(s), ${mismatchIndexes.length} mismatch(es)`);
  }

  if (options.output === OutputFormat.Json) {
    const formatter = new JsonFormatter(input.source, settings);
    result.chunks.forEach((text, i) => formatter.addChunk(text, chunkTokens[i] ?? []));
    if (report) formatter.setRoundTrip(report.ok, mismatchIndexes);
    console.log(formatter.toJson());
  } else {
    printSourceHeader(input.source);
    result.chunks.forEach((text, i) => printChunk(i, result.chunks.length, text, chunkTokens[i]?.length ?? 0));
    const totalTokens = chunkTokens.reduce((sum, tokens) => sum + tokens.length, 0);
    printSplitSummary(result.chunks.length, totalTokens, settings);
    if (report) printRoundTripSummary(report.checked, mismatchIndexes);
  }

  return report && !report.ok ? 1 : 0;
}
