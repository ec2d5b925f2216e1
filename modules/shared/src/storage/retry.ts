/**
 * Authorization Code Service - DynamoDB Retry Policy
 *
 * Throttling and 5xx failures from DynamoDB are retried with capped
 * exponential backoff and full jitter. Conditional-check failures are the
 * store's answer to a lost race (code already redeemed, pending already
 * finalized) and surface immediately.
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

export interface RetryConfig {
    /** Retries after the first attempt */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

/** Worst case about 3.1s of waiting before the sixth and last attempt */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 5,
    baseDelayMs: 100,
    maxDelayMs: 5000,
};

// =============================================================================
// Classification
// =============================================================================

const TRANSIENT_ERROR_NAMES: ReadonlySet<string> = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

function property(value: object, key: string): unknown {
    return key in value ? Reflect.get(value, key) : undefined;
}

function httpStatusOf(error: object): number | undefined {
    const metadata = property(error, '$metadata');
    if (typeof metadata !== 'object' || metadata === null) {
        return undefined;
    }
    const status = property(metadata, 'httpStatusCode');
    return typeof status === 'number' ? status : undefined;
}

/**
 * True for failures worth another attempt: a throttling or transient
 * service error by name, a 429/5xx status in the SDK's `$metadata`, or an
 * error the SDK marked `$retryable`.
 */
export function isRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
        return false;
    }

    const name = property(error, 'name');
    if (typeof name === 'string' && TRANSIENT_ERROR_NAMES.has(name)) {
        return true;
    }

    const status = httpStatusOf(error);
    if (status !== undefined && TRANSIENT_STATUS_CODES.has(status)) {
        return true;
    }

    const retryable = property(error, '$retryable');
    return typeof retryable === 'object' && retryable !== null;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Full-jitter delay before retry number `attempt + 1`: a uniform draw from
 * [0, min(base * 2^attempt, max)).
 */
export function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
    const ceiling = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
    return Math.floor(Math.random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run a DynamoDB call under the retry policy.
 *
 * @throws The first non-retryable error, or the last error once retries run out
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => client.send(new GetCommand({ ... })));
 * ```
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= config.maxRetries || !isRetryableError(error)) {
                throw error;
            }
            await sleep(calculateDelay(attempt, config));
        }
    }
}
