/**
 * Token Endpoint - Access Token Signer
 *
 * Signs RFC 9068 access tokens with a service-wide HMAC key (HS256).
 * The same key verifies them, so `verifyAccessToken` is usable by any
 * resource server that shares the secret.
 *
 * Claims:
 * - iss: configured issuer
 * - sub, aud, client_id: the client the code was issued to
 * - scope: space-delimited granted scopes
 * - jti: random UUID
 * - iat, nbf, exp: `exp - iat` is the configured lifetime
 *
 * @module oauth2_token/signer
 * @see RFC 7519 - JSON Web Token (JWT)
 * @see RFC 9068 - JWT Profile for OAuth 2.0 Access Tokens
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, errors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import { ACCESS_TOKEN_JWT_TYPE, JwtAlgorithm, joinScopes } from '@authcode/shared';

// =============================================================================
// Types
// =============================================================================

/**
 * Access token payload per RFC 9068.
 */
export interface AccessTokenClaims {
    readonly iss: string;
    /** The client; there is no end-user identity in this service */
    readonly sub: string;
    readonly aud: string;
    readonly client_id: string;
    /** Space-delimited scope string */
    readonly scope: string;
    readonly jti: string;
    /** Unix timestamps */
    readonly iat: number;
    readonly nbf: number;
    readonly exp: number;
}

export interface SignerConfig {
    readonly issuer: string;
    readonly signingSecret: string;
    /** Emitted as the `kid` header when set */
    readonly keyId?: string;
    /** Lifetime in seconds */
    readonly ttlSeconds: number;
}

export interface SignedAccessToken {
    readonly token: string;
    readonly claims: AccessTokenClaims;
}

export interface VerifyOptions {
    readonly signingSecret: string;
    readonly issuer: string;
    /** Epoch seconds to verify against; defaults to the wall clock */
    readonly now?: number;
}

const encoder = new TextEncoder();

function secretKey(secret: string): Uint8Array {
    return encoder.encode(secret);
}

// =============================================================================
// Signing
// =============================================================================

/**
 * Sign an access token for `clientId`.
 *
 * @param now - Issuance time in epoch seconds
 */
export async function signAccessToken(
    clientId: string,
    scopes: string[],
    config: SignerConfig,
    now: number
): Promise<SignedAccessToken> {
    const claims: AccessTokenClaims = {
        iss: config.issuer,
        sub: clientId,
        aud: clientId,
        client_id: clientId,
        scope: joinScopes(scopes),
        jti: randomUUID(),
        iat: now,
        nbf: now,
        exp: now + config.ttlSeconds,
    };

    const token = await new SignJWT({ client_id: claims.client_id, scope: claims.scope })
        .setProtectedHeader({
            alg: JwtAlgorithm.HS256,
            typ: ACCESS_TOKEN_JWT_TYPE,
            ...(config.keyId ? { kid: config.keyId } : {}),
        })
        .setIssuer(claims.iss)
        .setSubject(claims.sub)
        .setAudience(claims.aud)
        .setJti(claims.jti)
        .setIssuedAt(claims.iat)
        .setNotBefore(claims.nbf)
        .setExpirationTime(claims.exp)
        .sign(secretKey(config.signingSecret));

    return { token, claims };
}

// =============================================================================
// Verification
// =============================================================================

function toClaims(payload: JWTPayload): AccessTokenClaims | null {
    const { iss, sub, aud, jti, iat, nbf, exp } = payload;
    const clientId = payload.client_id;
    const scope = payload.scope;

    if (
        typeof iss !== 'string' ||
        typeof sub !== 'string' ||
        typeof aud !== 'string' ||
        typeof jti !== 'string' ||
        typeof iat !== 'number' ||
        typeof nbf !== 'number' ||
        typeof exp !== 'number' ||
        typeof clientId !== 'string' ||
        typeof scope !== 'string'
    ) {
        return null;
    }

    return { iss, sub, aud, client_id: clientId, scope, jti, iat, nbf, exp };
}

/**
 * Verify signature, type, issuer and expiry of an access token.
 * Returns null if the token is invalid or expired.
 */
export async function verifyAccessToken(
    token: string,
    options: VerifyOptions
): Promise<AccessTokenClaims | null> {
    try {
        const { payload } = await jwtVerify(token, secretKey(options.signingSecret), {
            algorithms: [JwtAlgorithm.HS256],
            issuer: options.issuer,
            typ: ACCESS_TOKEN_JWT_TYPE,
            ...(options.now !== undefined && { currentDate: new Date(options.now * 1000) }),
        });
        return toClaims(payload);
    } catch (err) {
        if (err instanceof errors.JOSEError) {
            return null;
        }
        throw err;
    }
}
