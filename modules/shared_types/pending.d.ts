/**
 * Authorization Code Service - Pending Authorization Entity Types
 *
 * Created by GET /auth after the request validates, consumed by
 * GET /confirm_auth when the resource owner approves or denies.
 *
 * Key Pattern:
 *   PK: PENDING#<sha256(session_token)>
 *   SK: METADATA
 *
 * The browser holds the raw session token in an HttpOnly cookie; only its
 * hash is stored, the same way the token hashes of bearer credentials are.
 */

import type { BaseItem } from './base';

// =============================================================================
// Pending Authorization Entity
// =============================================================================

export interface PendingAuthorizationItem extends BaseItem {
    /** PK pattern: PENDING#<session_token_hash> */
    PK: `PENDING#${string}`;
    SK: 'METADATA';
    entityType: 'PENDING_AUTHORIZATION';

    /** Expiry in epoch seconds; the item is dead once `ttl <= now` */
    ttl: number;

    /** SHA-256 of the session token carried by the cookie */
    sessionTokenHash: string;

    /** Code minted at issuance; redeemable only after approval */
    code: string;

    /** Must come back in the consent form's csrf_token field */
    csrfToken: string;

    /** Client that initiated the request */
    clientId: string;

    /** Requested scopes (space-delimited) */
    scope: string;

    /** Opaque client state, echoed back on the redirect */
    state: string;

    /** Redirect URI from the validated request */
    redirectUri: string;

    /** ISO 8601 expiry, mirrors `ttl` */
    expiresAt: string;
}
