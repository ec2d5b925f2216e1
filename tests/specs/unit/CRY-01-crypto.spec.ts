/**
 * CRY-01: Crypto Helpers
 */

import { describe, it, expect } from 'vitest';
import {
  base64UrlEncode,
  constantTimeEqual,
  generateSecureRandom,
  hashToken,
} from '@authcode/shared';

describe('CRY-01: Crypto Helpers', () => {
  it('should hash tokens to lowercase SHA-256 hex', () => {
    expect(hashToken('test-secret')).toBe(
      '9caf06bb4436cdbfa20af9121a626bc1093c4f54b31c0fa937957856135345b6'
    );
  });

  it('should compare strings by content and length', () => {
    expect(constantTimeEqual('abc', 'abc')).toBe(true);
    expect(constantTimeEqual('abc', 'abd')).toBe(false);
    expect(constantTimeEqual('abc', 'abcd')).toBe(false);
  });

  it('should encode base64url without padding', () => {
    expect(base64UrlEncode(Buffer.from([0xfb, 0xff]))).toBe('-_8');
    expect(base64UrlEncode('hi')).toBe('aGk');
  });

  it('should generate 43-character base64url values from 32 bytes', () => {
    const first = generateSecureRandom();
    const second = generateSecureRandom();

    expect(first).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(second).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(first).not.toBe(second);
    expect(generateSecureRandom(16)).toHaveLength(22);
  });
});
