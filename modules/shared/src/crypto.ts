/**
 * Authorization Code Service - Cryptographic Utilities
 *
 * Secure random generation, hashing and constant-time comparison.
 *
 * Security Architecture:
 * - Random values come from Node.js crypto (CSPRNG backed by OS entropy)
 * - Session tokens and client secrets are stored only as SHA-256 digests
 * - Digest comparisons use timingSafeEqual
 *
 * @see RFC 4648 Section 5 - Base64url Encoding
 * @see RFC 6749 Section 10.10 - Credentials-Guessing Attacks
 */

import { createHash, randomBytes, randomUUID, timingSafeEqual } from 'node:crypto';

// =============================================================================
// Constants
// =============================================================================

/** Hash algorithm used for token and secret hashing */
const HASH_ALGORITHM = 'sha256';

/** Default entropy bytes for secure random generation (256 bits) */
const DEFAULT_ENTROPY_BYTES = 32;

// =============================================================================
// Hashing
// =============================================================================

/**
 * Hash a token or secret for storage. Raw values are never stored.
 *
 * @returns SHA-256 hash (hex encoded, 64 characters)
 *
 * @example
 * ```typescript
 * const sessionToken = generateSecureRandom();
 * const pk = `PENDING#${hashToken(sessionToken)}`;
 * ```
 */
export function hashToken(token: string): string {
    return createHash(HASH_ALGORITHM).update(token).digest('hex');
}

/**
 * Compare two strings in constant time. Unequal lengths return false
 * without comparing contents.
 */
export function constantTimeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf-8');
    const right = Buffer.from(b, 'utf-8');
    if (left.length !== right.length) {
        return false;
    }
    return timingSafeEqual(left, right);
}

// =============================================================================
// Base64URL Encoding
// =============================================================================

/**
 * Encode a buffer to base64url format (RFC 4648 Section 5).
 * Base64url is URL-safe: '+' → '-', '/' → '_', no padding.
 */
export function base64UrlEncode(data: Buffer | string): string {
    const buffer = typeof data === 'string' ? Buffer.from(data) : data;
    return buffer
        .toString('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=+$/, '');
}

// =============================================================================
// Secure Random Generation
// =============================================================================

/**
 * Generate a cryptographically secure random string.
 * Used for authorization codes, session tokens and client secrets.
 *
 * @param byteLength - Number of random bytes (default: 32, providing 256 bits of entropy)
 * @returns Base64url-encoded random string (43 characters for 32 bytes)
 */
export function generateSecureRandom(byteLength = DEFAULT_ENTROPY_BYTES): string {
    return base64UrlEncode(randomBytes(byteLength));
}

/**
 * Identifier for one logical write, reused by every retry of it. Fits the
 * 36-character limit of DynamoDB's `ClientRequestToken`.
 */
export function generateRequestToken(): string {
    return randomUUID();
}
