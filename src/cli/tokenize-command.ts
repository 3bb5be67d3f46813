import type { Command } from 'commander';
import { loadConfig, parseEnvironment, parseTokenizeOptions, readInput } from '../boundaries/index';
import { resolveSettings } from '../config/config';
import { handleUnknownError } from '../errors/index';
import { error, log, setSilentMode } from '../output/logger';
import { printTokens } from '../output/reporter';
import { createTokenizer } from '../tokenizers/tokenizer-factory';
import { OutputFormat, type CommandIO } from './types';

/*
 * Registers the 'tokenize' command: prints the tokens the configured
 * tokenizer produces for the input, to help choose a chunk size.
 */
export function registerTokenizeCommand(program: Command): void {
  program
    .command('tokenize')
    .description('Print the tokens of a file or stdin')
    .argument('[file]', 'Input file; reads stdin when omitted or "-"')
    .option('-t, --tokenizer <type>', 'Tokenizer: basic, character, gpt')
    .option('--lowercase', 'Lowercase tokens (basic tokenizer only)')
    .option('--output <format>', 'Output format: line, json', 'line')
    .option('--config <path>', 'Path to a config file (defaults to .tokensplit.ini)')
    .option('-v, --verbose', 'Print the token count', false)
    .action(async (file: string | undefined, rawOpts: unknown) => {
      const code = await executeTokenize(file, rawOpts, {
        cwd: process.cwd(),
        env: process.env,
        stdin: process.stdin,
      });
      process.exit(code);
    });
}

export async function executeTokenize(file: string | undefined, rawOpts: unknown, io: CommandIO): Promise<number> {
  try {
    const options = parseTokenizeOptions(rawOpts);
    setSilentMode(options.output === OutputFormat.Json);
    const settings = resolveSettings({
      cli: options,
      env: parseEnvironment(io.env),
      file: loadConfig(io.cwd, options.config),
    });
    const input = await readInput(file, io.cwd, io.stdin);
    const tokens = createTokenizer(settings.tokenizer, { lowercase: settings.lowercase }).tokenize(input.text);

    if (options.output === OutputFormat.Json) {
      console.log(JSON.stringify({ source: input.source, tokenizer: settings.tokenizer, tokenCount: tokens.length, tokens }, null, 2));
    } else {
      printTokens(tokens);
      if (options.verbose) log(`${tokens.length} token(s)`);
    }
    return 0;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Tokenizing input');
    error(`Error: ${err.message}`);
    return 1;
  }
}
