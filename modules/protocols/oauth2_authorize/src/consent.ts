/**
 * Consent Handler - GET /confirm_auth
 *
 * Applies the resource owner's decision to the pending authorization bound
 * to the browser's session cookie, then sends the browser back to the
 * client with either the code or access_denied.
 *
 * Flow:
 * 1. Read the session token from the pending-authorization cookie
 * 2. Parse the authorize decision
 * 3. Resolve the pending authorization (expired counts as absent)
 * 4. Require client_id, state and csrf_token to match the pending record
 * 5. Re-check the client and its registered redirect URI
 * 6. Finalize atomically (approval makes the code redeemable)
 * 7. Redirect to the client and clear the cookie
 *
 * Security:
 * - The pending record is keyed by the cookie, never by request parameters
 * - The csrf_token is only ever shown in the consent page, so a client
 *   cannot submit a decision on the user's behalf
 * - Each pending authorization is finalized at most once
 * - Errors never redirect; only a fully verified request reaches the client
 *
 * @module oauth2_authorize/consent
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.2
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import {
    AuthorizationErrors,
    buildClearCookieHeader,
    buildRedirectUrl,
    constantTimeEqual,
    createLogger,
    describeError,
    epochToIso,
    getCookie,
    oauthError,
    redirect,
    serverError,
    withContext,
} from '@authcode/shared';
import type { AuditLogger, AuthorizationErrorCode, ErrorMessageKey } from '@authcode/shared';
import type { AuthorizeDependencies, HttpHandler } from './types';

// =============================================================================
// Decision Parsing
// =============================================================================

const APPROVE_VALUES = new Set(['true', '1', 'on']);
const DENY_VALUES = new Set(['false', '0', 'off']);

/**
 * Parse the `authorize` parameter. Returns null for anything that is not a
 * recognizable yes or no.
 */
export function parseDecision(value: string | undefined): boolean | null {
    if (value === undefined) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (APPROVE_VALUES.has(normalized)) return true;
    if (DENY_VALUES.has(normalized)) return false;
    return null;
}

// =============================================================================
// Handler
// =============================================================================

function rejectConsent(
    audit: AuditLogger,
    error: AuthorizationErrorCode,
    reason: ErrorMessageKey,
    clientId?: string
): APIGatewayProxyResultV2 {
    audit.authRequestRejected({ clientId, error, reason });
    return oauthError(error);
}

/**
 * Build the /confirm_auth handler around a dependency resolver.
 */
export function createConfirmHandler(resolveDeps: () => AuthorizeDependencies): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context) => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            const { registry, store, config, now } = resolveDeps();
            const { INVALID_REQUEST, INVALID_CLIENT } = AuthorizationErrors;
            const q = event.queryStringParameters || {};

            // 1. Session binding
            const sessionToken = getCookie(event, config.pendingCookieName);
            if (!sessionToken) {
                return rejectConsent(audit, INVALID_REQUEST, 'MISSING_PENDING_COOKIE');
            }

            // 2. Decision
            const approved = parseDecision(q.authorize);
            if (approved === null) {
                return rejectConsent(audit, INVALID_REQUEST, 'INVALID_DECISION');
            }

            // 3. Pending authorization
            const currentTime = now();
            const pending = await store.resolvePending(sessionToken, currentTime);
            if (!pending) {
                return rejectConsent(audit, INVALID_REQUEST, 'PENDING_NOT_FOUND');
            }

            // 4. The form must belong to this pending authorization
            if (q.client_id !== pending.clientId || q.state !== pending.state) {
                return rejectConsent(audit, INVALID_REQUEST, 'PENDING_MISMATCH', pending.clientId);
            }
            if (!q.csrf_token || !constantTimeEqual(q.csrf_token, pending.csrfToken)) {
                return rejectConsent(audit, INVALID_REQUEST, 'CSRF_TOKEN_MISMATCH', pending.clientId);
            }

            // 5. Client may have changed since the request was validated
            const client = await registry.lookup(pending.clientId);
            if (!client) {
                return rejectConsent(audit, INVALID_CLIENT, 'UNKNOWN_CLIENT', pending.clientId);
            }
            if (client.redirectUri !== pending.redirectUri) {
                return rejectConsent(audit, INVALID_REQUEST, 'REDIRECT_URI_MISMATCH', pending.clientId);
            }

            // 6. Finalize
            const result = await store.finalize(sessionToken, approved, currentTime);
            if (result.outcome === 'expired_or_absent') {
                return rejectConsent(audit, INVALID_REQUEST, 'PENDING_NOT_FOUND', pending.clientId);
            }

            audit.consentDecided(approved, { clientId: pending.clientId, scopes: pending.scopes });

            // 7. Back to the client
            const clearCookie = buildClearCookieHeader(config.pendingCookieName);

            if (result.outcome === 'denied') {
                logger.info('Consent denied', { clientId: pending.clientId });
                return redirect(
                    buildRedirectUrl(pending.redirectUri, {
                        error: AuthorizationErrors.ACCESS_DENIED,
                        state: pending.state,
                    }),
                    clearCookie
                );
            }

            audit.authCodeIssued({
                clientId: result.code.clientId,
                scopes: result.code.scopes,
                expiresAt: epochToIso(result.code.expiresAt),
            });

            return redirect(
                buildRedirectUrl(pending.redirectUri, {
                    code: result.code.code,
                    state: pending.state,
                }),
                clearCookie
            );
        } catch (err) {
            logger.error('Consent handler error', describeError(err));
            return serverError();
        }
    };
}
