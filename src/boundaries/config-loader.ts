import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

enum ConfigKey {
  CHUNK_SIZE = 'ChunkSize',
  OVERLAP_SIZE = 'OverlapSize',
  TOKENIZER = 'Tokenizer',
  LOWERCASE = 'Lowercase',
}

const stripQuotes = (str: string): string =>
  str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');

function parseInteger(key: ConfigKey, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
  return parseInt(trimmed, 10);
}

function parseBoolean(key: ConfigKey, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
    case '1':
      return true;
    case 'false':
    case 'no':
    case '0':
      return false;
    default:
      throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
}

/**
 * Load and validate configuration from .tokensplit.ini.
 *
 * The default file is optional: when it is absent an empty config comes back.
 * A file named explicitly through `configPath` must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${iniPath}`);
    }
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(iniPath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const configData: Record<string, unknown> = { configPath: iniPath };

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;

    const key = m[1];
    const val = stripQuotes((m[2] || '').trim());

    switch (key) {
      case ConfigKey.CHUNK_SIZE:
        configData.chunkSize = parseInteger(ConfigKey.CHUNK_SIZE, val);
        break;
      case ConfigKey.OVERLAP_SIZE:
        configData.overlapSize = parseInteger(ConfigKey.OVERLAP_SIZE, val);
        break;
      case ConfigKey.TOKENIZER:
        configData.tokenizer = val;
        break;
      case ConfigKey.LOWERCASE:
        configData.lowercase = parseBoolean(ConfigKey.LOWERCASE, val);
        break;
    }
  }

  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid configuration in ${iniPath}: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
