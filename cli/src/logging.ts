/**
 * logging.ts
 *
 * Lightweight logging helpers used across the CLI. Implemented on top of
 * console to keep the dependency surface small. Environment variable
 * `LOG_DEBUG` enables verbose debug logs; `setDebug` overrides it once the
 * configuration has been read.
 */

let debugOverride: boolean | null = null;

export function setDebug(enabled: boolean) {
    debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
    if (debugOverride !== null) return debugOverride;
    return process.env.LOG_DEBUG === '1' || process.env.LOG_DEBUG === 'true';
}

export function debug(...args: unknown[]) {
    if (isDebugEnabled()) {
        console.error(...args);
    }
}

export function info(...args: unknown[]) {
    console.log(...args);
}

export function warn(...args: unknown[]) {
    console.warn(...args);
}

export function error(...args: unknown[]) {
    console.error(...args);
}
