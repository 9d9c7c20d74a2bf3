import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt; `1` gives a fixed delay. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Called after every failed attempt, before the delay. */
    onAttemptFailed?: (attempt: number, error: unknown) => void;
    /** Stops retrying once aborted; the pending delay resolves early. */
    signal?: AbortSignal;
    sleep?: (ms: number) => Promise<void>;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
    aborted?: boolean;
}

const DEFAULTS: Required<Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay grows by `backoffFactor` after each attempt (capped at `maxDelayMs`).
 * - All attempts are logged for postmortem traceability.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => probeOnce(url),
 *   { maxAttempts: 5, baseDelayMs: 3000, backoffFactor: 1, label: 'health:probe' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const wait = options.sleep ?? ((ms: number) => sleep(ms, options.signal));

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            return {
                ok: false,
                error: lastError || 'aborted',
                attempts: attempt - 1,
                totalDurationMs: Date.now() - start,
                aborted: true,
            };
        }

        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                await logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);
            options.onAttemptFailed?.(attempt, err);

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                await logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await wait(delay);
            } else {
                await logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
