/**
 * RTY-01: DynamoDB Retry Policy
 *
 * Throttling and 5xx failures are retried with capped exponential backoff
 * and full jitter. Anything else, a failed condition check included,
 * surfaces on the first attempt.
 */

import { describe, it, expect, vi } from 'vitest';
import { storage } from '@authcode/shared';

const { calculateDelay, isRetryableError, withRetry } = storage;

const NO_WAIT = { maxRetries: 3, baseDelayMs: 0, maxDelayMs: 0 };

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

describe('RTY-01: DynamoDB Retry Policy', () => {
  describe('isRetryableError', () => {
    it('should retry throttling and transient service errors by name', () => {
      expect(isRetryableError(awsError('ProvisionedThroughputExceededException', 400))).toBe(true);
      expect(isRetryableError(awsError('TransactionConflictException', 400))).toBe(true);
    });

    it('should retry on a 429 or 5xx status', () => {
      expect(isRetryableError(awsError('SomethingElse', 429))).toBe(true);
      expect(isRetryableError(awsError('SomethingElse', 503))).toBe(true);
    });

    it('should retry errors the SDK marks $retryable', () => {
      expect(isRetryableError({ name: 'Unknown', $retryable: { throttling: false } })).toBe(true);
    });

    it('should not retry a failed condition check or a plain error', () => {
      expect(isRetryableError(awsError('ConditionalCheckFailedException', 400))).toBe(false);
      expect(isRetryableError(new Error('boom'))).toBe(false);
      expect(isRetryableError('boom')).toBe(false);
      expect(isRetryableError(null)).toBe(false);
    });
  });

  describe('calculateDelay', () => {
    it('should scale a random fraction of the doubled, capped delay', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      const config = { maxRetries: 5, baseDelayMs: 100, maxDelayMs: 500 };

      expect(calculateDelay(0, config)).toBe(50);
      expect(calculateDelay(2, config)).toBe(200);
      expect(calculateDelay(4, config)).toBe(250);
    });
  });

  describe('withRetry', () => {
    it('should return once a retried operation succeeds', async () => {
      const operation = vi.fn<() => Promise<string>>()
        .mockRejectedValueOnce(awsError('ThrottlingException', 400))
        .mockRejectedValueOnce(awsError('InternalServerError', 500))
        .mockResolvedValueOnce('ok');

      await expect(withRetry(operation, NO_WAIT)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should rethrow a non-retryable error without retrying', async () => {
      const failure = awsError('ConditionalCheckFailedException', 400);
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(withRetry(operation, NO_WAIT)).rejects.toBe(failure);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxRetries retries with the last error', async () => {
      const failure = awsError('ThrottlingException', 400);
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(withRetry(operation, NO_WAIT)).rejects.toBe(failure);
      expect(operation).toHaveBeenCalledTimes(4);
    });
  });
});
