/**
 * Client Authentication
 *
 * Implements RFC 6749 Section 2.3.1 for confidential clients:
 *   - HTTP Basic Authentication (client_secret_basic) - RECOMMENDED per RFC 6749
 *   - POST body credentials (client_secret_post) - Supported for compatibility
 *
 * Security Controls:
 *   - Constant-time comparison prevents timing attacks on secret verification (RFC 9700)
 *   - SHA-256 hashing for stored secrets (secrets never stored in plaintext)
 *   - Unknown client and wrong secret produce the same wire error
 *
 * @module shared/auth/client-auth
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-2.3.1
 * @see https://datatracker.ietf.org/doc/html/rfc9700 (OAuth Security BCP)
 */

import type { ClientRegistry, RegisteredClient } from '../../../shared_types/api';
import type { ClientAuthenticatedDetails, ClientAuthFailedDetails } from '../../../shared_types/audit';
import { constantTimeEqual, hashToken } from '../crypto';

// =============================================================================
// Types
// =============================================================================

export type ClientAuthMethod = ClientAuthenticatedDetails['method'];

/**
 * Extracted client credentials from request.
 */
export interface ClientCredentials {
    clientId?: string;
    clientSecret?: string;
    method: ClientAuthMethod;
}

/**
 * Result of client authentication attempt.
 */
export type ClientAuthResult =
    | { valid: true; client: RegisteredClient; method: ClientAuthMethod }
    | { valid: false; reason: ClientAuthFailedDetails['reason'] };

// =============================================================================
// Credential Extraction
// =============================================================================

const BASIC_SCHEME = /^basic /i;

/**
 * Extract client credentials from request.
 *
 * Per RFC 6749 Section 2.3.1, credentials can be provided via:
 * 1. HTTP Basic Authentication header (RECOMMENDED)
 * 2. Request body parameters (client_id, client_secret)
 *
 * The Authorization header takes precedence if both are provided.
 */
export function extractClientCredentials(
    params: URLSearchParams,
    authHeader?: string
): ClientCredentials {
    // Scheme names are case-insensitive (RFC 7235 Section 2.1)
    if (authHeader && BASIC_SCHEME.test(authHeader)) {
        const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf8');
        // Per RFC 7617, the user-id (client_id) cannot contain a colon,
        // but the password (client_secret) can. Split only on first colon.
        const colonIndex = decoded.indexOf(':');
        if (colonIndex > 0) {
            const clientId = safeDecodeURIComponent(decoded.substring(0, colonIndex));
            const clientSecret = safeDecodeURIComponent(decoded.substring(colonIndex + 1));
            if (clientId !== undefined && clientSecret !== undefined) {
                return {
                    clientId,
                    clientSecret: clientSecret || undefined,
                    method: 'client_secret_basic',
                };
            }
        }
    }

    return {
        clientId: params.get('client_id') || undefined,
        clientSecret: params.get('client_secret') || undefined,
        method: 'client_secret_post',
    };
}

/**
 * RFC 6749 Appendix B form-encodes Basic credentials; a malformed escape
 * makes the header unusable.
 */
function safeDecodeURIComponent(value: string): string | undefined {
    try {
        return decodeURIComponent(value.replace(/\+/g, ' '));
    } catch (err) {
        if (err instanceof URIError) {
            return undefined;
        }
        throw err;
    }
}

// =============================================================================
// Secret Verification
// =============================================================================

/**
 * Verify client secret using constant-time comparison.
 *
 * The provided secret is hashed before comparison since only hashes are stored.
 */
export function verifyClientSecret(secret: string, storedHash: string): boolean {
    return constantTimeEqual(hashToken(secret), storedHash);
}

// =============================================================================
// Client Authentication
// =============================================================================

/**
 * Resolve the client and check its secret.
 */
export async function authenticateClient(
    clientId: string,
    clientSecret: string,
    method: ClientAuthMethod,
    registry: ClientRegistry
): Promise<ClientAuthResult> {
    const client = await registry.lookup(clientId);
    if (!client) {
        return { valid: false, reason: 'unknown_client' };
    }

    if (!verifyClientSecret(clientSecret, client.clientSecretHash)) {
        return { valid: false, reason: 'invalid_secret' };
    }

    return { valid: true, client, method };
}
