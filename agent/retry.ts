export type CapabilityErrorKind =
    | 'Timeout'
    | 'NotFound'
    | 'ProviderError'
    | 'ModelUnavailable'
    | 'MalformedOutput'
    | 'Transient'
    | 'Terminal'
    | 'Unavailable';

/**
 * Failure reported by an external capability (observation source, classifier, notifier, audit sink).
 * `retryable` drives the retry policy: transient failures are retried, terminal ones end the attempt.
 */
export class CapabilityError extends Error {
    readonly kind: CapabilityErrorKind;
    readonly retryable: boolean;

    constructor(kind: CapabilityErrorKind, message: string, options: { retryable: boolean; cause?: unknown }) {
        super(message, { cause: options.cause });
        this.name = 'CapabilityError';
        this.kind = kind;
        this.retryable = options.retryable;
    }
}

export interface RetryPolicy {
    retries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number };

export interface RetryHooks {
    onAttemptFailed?: (err: unknown, attempt: number, willRetry: boolean) => void;
    sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function isRetryable(err: unknown): boolean {
    return err instanceof CapabilityError ? err.retryable : true;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export function describeError(err: unknown): string {
    if (err instanceof CapabilityError) return `${err.kind}: ${err.message}`;
    if (err instanceof Error) return err.message;
    return String(err);
}

/**
 * Run `fn` with an upper bound on its latency. The signal is aborted when the bound passes.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    ms: number,
    label: string,
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new CapabilityError('Timeout', `${label} timed out after ${ms}ms`, { retryable: true }));
        }, ms);
    });

    try {
        return await Promise.race([fn(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * At most `retries + 1` attempts with exponential backoff. Never throws.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
    const wait = hooks.sleep ?? sleep;
    let attempt = 0;

    while (true) {
        attempt += 1;
        try {
            const value = await fn(attempt);
            return { ok: true, value, attempts: attempt };
        } catch (err) {
            const willRetry = attempt <= policy.retries && isRetryable(err);
            hooks.onAttemptFailed?.(err, attempt, willRetry);
            if (!willRetry) {
                return { ok: false, error: err, attempts: attempt };
            }
            await wait(backoffDelay(policy, attempt));
        }
    }
}
