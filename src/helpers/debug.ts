/**
 * Logging utilities.
 * DEBUG is automatically true when NODE_ENV=development.
 */

export const DEBUG = process.env.NODE_ENV === 'development';

/** Anything shaped like `console` for the three levels the imposer uses. */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Log only in development mode. Use for verbose per-card tracing.
 * Progress, warnings and errors go through an injected Logger.
 */
export function debugLog(...args: unknown[]): void {
    if (DEBUG) {
        console.log(...args);
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
