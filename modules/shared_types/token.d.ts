/**
 * Authorization Code Service - Authorization Code Entity Types
 *
 * Codes become redeemable when the resource owner approves a pending
 * authorization. Access tokens are self-contained JWTs and are not stored.
 *
 * Security:
 * - Codes are single-use (used flag flipped by a conditional update)
 * - Codes are bound to the client and to the redirect URI of the request
 * - Codes expire shortly after issuance
 *
 * @see RFC 6749 Section 4.1.2 - Authorization Response
 * @see RFC 6749 Section 10.5 - Authorization Codes
 */

import type { BaseItem } from './base';

// =============================================================================
// Authorization Code Entity
// PK: CODE#<code>  SK: METADATA
// =============================================================================

export interface AuthCodeItem extends BaseItem {
    /** PK pattern: CODE#<authorization_code> */
    PK: `CODE#${string}`;
    SK: 'METADATA';
    entityType: 'AUTH_CODE';

    /** Expiry in epoch seconds */
    ttl: number;

    /** The authorization code value (cryptographically random) */
    code: string;

    /** Client that this code was issued to */
    clientId: string;

    /** Granted scopes (space-delimited) */
    scope: string;

    /** redirect_uri from original request - must match at token exchange */
    redirectUri: string;

    /** Whether this code has been exchanged */
    used: boolean;

    /** ISO 8601 timestamp when code was issued */
    issuedAt: string;

    /** ISO 8601 expiry, mirrors `ttl` */
    expiresAt: string;

    /** ISO 8601 timestamp of redemption */
    usedAt?: string;

    /** Request token of the redemption that claimed the code */
    claimId?: string;
}
