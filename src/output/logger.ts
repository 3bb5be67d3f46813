/**
 * Logger utility for tokensplit
 *
 * Provides console output functions that can be silenced for machine-readable
 * output formats (json). In those formats stdout carries only the structured
 * document and nothing else.
 */

let silentMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Verbose diagnostics, prefixed with the tool name. Goes to stderr so that
 * it never interleaves with chunk output on stdout.
 */
export function debug(message: string): void {
    if (!silentMode) {
        console.error(`[tokensplit] ${message}`);
    }
}
