/**
 * Authorization Code Grant
 *
 * Exchanges an approved authorization code for a signed access token.
 *
 * Flow (fail fast):
 * 1. grant_type must be "authorization_code" (unsupported_grant_type)
 * 2. client_id, client_secret, code and redirect_uri are required (invalid_request)
 * 3. Authenticate the client: registered, constant-time secret match (invalid_client)
 * 4. Redeem the code for this client and redirect URI (invalid_grant)
 * 5. Sign the access token
 *
 * Security Controls:
 * - Single-use codes: redemption is one conditional write in the store
 * - Client binding and redirect URI binding checked in the same write
 * - The code is spent before the token is signed
 *
 * @module oauth2_token/grants/authorization-code
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.3
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-10.5
 */

import {
    GrantTypes,
    TokenErrors,
    TokenTypes,
    authenticateClient,
    extractClientCredentials,
} from '@authcode/shared';
import type { AuditLogger, ErrorMessageKey, RedeemFailureReason, TokenErrorCode } from '@authcode/shared';
import { signAccessToken } from '../signer';
import type { AccessTokenResponse, TokenDependencies } from '../types';

// =============================================================================
// Types
// =============================================================================

export type GrantResult =
    | { readonly ok: true; readonly response: AccessTokenResponse }
    | { readonly ok: false; readonly error: TokenErrorCode; readonly reason: ErrorMessageKey };

/** Internal reason logged for each store rejection; the wire code is always invalid_grant */
const REDEEM_FAILURE_MESSAGES: Record<RedeemFailureReason, ErrorMessageKey> = {
    not_found: 'INVALID_CODE',
    already_used: 'CODE_ALREADY_USED',
    expired: 'CODE_EXPIRED',
    client_mismatch: 'CODE_CLIENT_MISMATCH',
    redirect_mismatch: 'CODE_REDIRECT_MISMATCH',
};

function fail(error: TokenErrorCode, reason: ErrorMessageKey): GrantResult {
    return { ok: false, error, reason };
}

// =============================================================================
// Grant Handler
// =============================================================================

/**
 * Run the authorization_code grant for a parsed token request.
 *
 * @param params - Token request parameters (form or JSON body)
 * @param authHeader - Authorization header, for client_secret_basic
 */
export async function exchangeAuthorizationCode(
    params: URLSearchParams,
    authHeader: string | undefined,
    deps: TokenDependencies,
    audit: AuditLogger
): Promise<GrantResult> {
    const { registry, store, config, now } = deps;

    // -------------------------------------------------------------------------
    // Step 1: Grant type
    // -------------------------------------------------------------------------
    if (params.get('grant_type') !== GrantTypes.AUTHORIZATION_CODE) {
        return fail(TokenErrors.UNSUPPORTED_GRANT_TYPE, 'UNSUPPORTED_GRANT');
    }

    // -------------------------------------------------------------------------
    // Step 2: Required parameters
    // -------------------------------------------------------------------------
    const { clientId, clientSecret, method } = extractClientCredentials(params, authHeader);
    const code = params.get('code');
    const redirectUri = params.get('redirect_uri');

    if (!clientId || !clientSecret || !code || !redirectUri) {
        return fail(TokenErrors.INVALID_REQUEST, 'MISSING_TOKEN_PARAMETERS');
    }

    // -------------------------------------------------------------------------
    // Step 3: Client authentication
    // -------------------------------------------------------------------------
    const auth = await authenticateClient(clientId, clientSecret, method, registry);
    if (!auth.valid) {
        audit.clientAuthFailed({ clientId, reason: auth.reason });
        return fail(TokenErrors.INVALID_CLIENT, 'CLIENT_AUTH_FAILED');
    }
    audit.clientAuthenticated({ clientId, method: auth.method });

    // -------------------------------------------------------------------------
    // Step 4: Redeem (atomic, single-use)
    // -------------------------------------------------------------------------
    const issuedAt = now();
    const redemption = await store.redeem(clientId, code, redirectUri, issuedAt);
    if (!redemption.ok) {
        audit.authCodeRejected({ clientId, reason: redemption.reason });
        return fail(TokenErrors.INVALID_GRANT, REDEEM_FAILURE_MESSAGES[redemption.reason]);
    }
    audit.authCodeExchanged(clientId);

    // -------------------------------------------------------------------------
    // Step 5: Access token
    // -------------------------------------------------------------------------
    const { token, claims } = await signAccessToken(
        clientId,
        redemption.code.scopes,
        {
            issuer: config.issuer,
            signingSecret: config.signingSecret,
            keyId: config.signingKeyId,
            ttlSeconds: config.accessTokenTtl,
        },
        issuedAt
    );

    audit.tokenIssued({
        clientId,
        scopes: redemption.code.scopes,
        expiresIn: config.accessTokenTtl,
        grantType: GrantTypes.AUTHORIZATION_CODE,
    });

    return {
        ok: true,
        response: {
            access_token: token,
            token_type: TokenTypes.BEARER,
            expires_in: claims.exp - claims.iat,
            scope: claims.scope,
        },
    };
}
