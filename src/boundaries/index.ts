export { parseSplitOptions, parseTokenizeOptions } from './cli-parser';
export { parseEnvironment } from './env-parser';
export { loadConfig } from './config-loader';
export { readInput, STDIN_SOURCE, type InputText } from './input-reader';
export { loadDotEnv } from './dotenv-loader';
