import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS: Required<Omit<RetryOptions, 'label'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay grows by `backoffFactor` after each attempt (capped at `maxDelayMs`).
 * - Intermediate failures are logged only when `label` is set.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => client.timelineDetail(tenantId, timelineId),
 *   { maxAttempts: 5, label: 'control-plane:timelineDetail' },
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
    const label = options.label;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            return { ok: true, value, attempts: attempt, totalDurationMs: Date.now() - start };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                if (label) {
                    await logThought(
                        `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                    );
                }
                await sleep(delay);
            } else if (label) {
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

export interface PollOptions {
    timeoutMs: number;
    intervalMs?: number;
    label: string;
}

/**
 * Poll `probe` at a fixed interval until it returns a value other than
 * `undefined`, or throw once `timeoutMs` has elapsed. The error carries the
 * last detail reported by `describePending`.
 */
export async function pollUntil<T>(
    probe: () => Promise<T | undefined>,
    describePending: () => string,
    options: PollOptions,
): Promise<T> {
    const intervalMs = options.intervalMs ?? 500;
    const maxAttempts = Math.max(1, Math.ceil(options.timeoutMs / Math.max(1, intervalMs)) + 1);
    const result = await withRetry(
        async () => {
            const value = await probe();
            if (value === undefined) {
                throw new Error(describePending());
            }
            return value;
        },
        { maxAttempts, baseDelayMs: intervalMs, backoffFactor: 1, maxDelayMs: intervalMs },
    );
    if (!result.ok || result.value === undefined) {
        throw new Error(
            `${options.label} did not complete within ${options.timeoutMs}ms: ${result.error ?? 'no detail'}`,
        );
    }
    return result.value;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
