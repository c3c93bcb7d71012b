/**
 * Console output for the chunkwise CLI.
 *
 * JSON output has to be the only thing written to stdout, so the command
 * turns on silent mode for it. Verbose diagnostics go through debug() and
 * only appear when verbose mode is on and silent mode is off.
 */

const PREFIX = '[chunkwise]';

let silentMode = false;
let verboseMode = false;

export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Prefixed diagnostic line, printed only in verbose mode.
 */
export function debug(message: string): void {
    if (verboseMode && !silentMode) {
        console.log(`${PREFIX} ${message}`);
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

// Always printed
export function error(...args: unknown[]): void {
    console.error(...args);
}
