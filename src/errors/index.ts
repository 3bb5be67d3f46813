// Base error class for all tokensplit errors
export class TokensplitError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'TokensplitError';
  }
}

// Validation error for CLI option and environment failures
export class ValidationError extends TokensplitError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends TokensplitError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Input error for missing or unreadable input text
export class InputError extends TokensplitError {
  constructor(message: string, public readonly source: string) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

// Tokenizer error for failures inside a tokenizer backend
export class TokenizerError extends TokensplitError {
  constructor(
    message: string,
    public readonly tokenizer: string,
    public override readonly cause?: unknown
  ) {
    super(message, 'TOKENIZER_ERROR');
    this.name = 'TokenizerError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
