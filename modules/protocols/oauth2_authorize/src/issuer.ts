/**
 * Code Issuer
 *
 * Mints the authorization code and the session token for a validated
 * request and records the pending authorization. The code is not
 * redeemable until the resource owner approves it at /confirm_auth.
 *
 * Security:
 * - 256-bit code, session token and CSRF token, drawn independently
 * - Only the session token travels to the browser in a cookie (HttpOnly);
 *   the CSRF token travels in the consent form
 *
 * @module oauth2_authorize/issuer
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-10.10
 */

import { generateSecureRandom } from '@authcode/shared';
import type {
    AuthorizationCodeStore,
    PendingAuthorization,
    ValidatedAuthorizationRequest,
} from './types';

/** 32 bytes = 256 bits of entropy */
const CODE_BYTES = 32;
const SESSION_TOKEN_BYTES = 32;
const CSRF_TOKEN_BYTES = 32;

export interface IssuedPendingAuthorization {
    /** Cookie value binding the browser to the pending record */
    readonly sessionToken: string;
    readonly pending: PendingAuthorization;
}

/**
 * Create and store a pending authorization for `request`.
 *
 * @param now - Epoch seconds
 * @param ttlSeconds - How long the resource owner has to decide
 */
export async function issuePendingAuthorization(
    request: ValidatedAuthorizationRequest,
    store: AuthorizationCodeStore,
    now: number,
    ttlSeconds: number
): Promise<IssuedPendingAuthorization> {
    const sessionToken = generateSecureRandom(SESSION_TOKEN_BYTES);

    const pending: PendingAuthorization = {
        code: generateSecureRandom(CODE_BYTES),
        csrfToken: generateSecureRandom(CSRF_TOKEN_BYTES),
        clientId: request.clientId,
        scopes: [...request.scopes],
        state: request.state,
        redirectUri: request.redirectUri,
        createdAt: now,
        expiresAt: now + ttlSeconds,
    };

    await store.createPending(sessionToken, pending);

    return { sessionToken, pending };
}
