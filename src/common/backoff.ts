/**
 * Longest delay `setTimeout` honours, larger values fire after 1ms.
 */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface IBackoffOptions {
    /**
     * Upper bound of the first delay, doubled on every attempt.
     */
    baseDelayMs: number;
    maxDelayMs?: number;
    random?: () => number;
}

/**
 * Exponential bound for the given zero based attempt: `base * 2 ^ attempt`, capped by `maxDelayMs`.
 */
export function exponentialBound( attempt: number, options: IBackoffOptions ): number {
    const { baseDelayMs, maxDelayMs = Infinity } = options;

    return Math.min( baseDelayMs * Math.pow( 2, attempt ), maxDelayMs );
}

/**
 * Full jitter, the delay is drawn uniformly from `[0, bound)`.
 */
export function fullJitterDelay( attempt: number, options: IBackoffOptions ): number {
    const random = options.random ?? Math.random;

    return random() * exponentialBound( attempt, options );
}
