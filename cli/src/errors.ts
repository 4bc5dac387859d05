/**
 * errors.ts
 *
 * Error types raised by the tracker. Each carries a stable `code` so the
 * entrypoint can map it to a short message without matching on text.
 */

export type TrackerErrorCode = 'CARD_NOT_MARKED' | 'SNAPSHOT_MALFORMED' | 'CONFIG_INVALID';

export class TrackerError extends Error {
    constructor(readonly code: TrackerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Raised by `unmarkCard` when the card carries no color annotation. */
export class CardNotMarkedError extends TrackerError {
    constructor(readonly card: string) {
        super('CARD_NOT_MARKED', `card "${card}" is not marked`);
    }
}

export class SnapshotFormatError extends TrackerError {
    constructor(readonly path: string, detail: string, cause?: unknown) {
        super('SNAPSHOT_MALFORMED', `malformed snapshot ${path}: ${detail}`, {cause});
    }
}

export class ConfigError extends TrackerError {
    constructor(detail: string) {
        super('CONFIG_INVALID', `invalid configuration: ${detail}`);
    }
}

export function isTrackerError(err: unknown): err is TrackerError {
    return err instanceof TrackerError;
}

/** One-line description of a failure for the terminal. */
export function describeError(err: unknown): string {
    if (isTrackerError(err)) return `${err.code}: ${err.message}`;
    if (err instanceof Error) return err.message;
    return String(err);
}
