/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.tokensplit.ini';
export const DOTENV_FILENAMES = ['.env', '.env.local'];
