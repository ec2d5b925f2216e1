/**
 * Token Endpoint - Type Definitions
 *
 * @module oauth2_token/types
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.3
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import type { AuthorizationCodeStore, ClientRegistry, TokenType } from '@authcode/shared';

export type {
    AuthorizationCodeStore,
    ClientRegistry,
    RedeemResult,
} from '@authcode/shared';

// =============================================================================
// Environment Configuration
// =============================================================================

/**
 * Token endpoint configuration.
 * All values come from Lambda environment variables.
 */
export interface TokenEnvConfig {
    readonly tableName: string;
    readonly region?: string;
    /** `iss` claim of every access token */
    readonly issuer: string;
    /** Service-wide HMAC key for HS256 access tokens */
    readonly signingSecret: string;
    /** Optional `kid` header, for key rotation on the verifier side */
    readonly signingKeyId?: string;
    /** Access token lifetime in seconds (`exp - iat` and `expires_in`) */
    readonly accessTokenTtl: number;
    /** Lifetime given to codes by the store adapter */
    readonly authCodeTtlSeconds: number;
}

// =============================================================================
// Handler Wiring
// =============================================================================

export interface TokenDependencies {
    readonly registry: ClientRegistry;
    readonly store: AuthorizationCodeStore;
    readonly config: TokenEnvConfig;
    /** Epoch seconds */
    readonly now: () => number;
}

export type HttpHandler = (
    event: APIGatewayProxyEventV2,
    context: Context
) => Promise<APIGatewayProxyResultV2>;

// =============================================================================
// Token Response (RFC 6749 Section 5.1)
// =============================================================================

export interface AccessTokenResponse {
    readonly access_token: string;
    readonly token_type: TokenType;
    /** Seconds until the token's `exp` */
    readonly expires_in: number;
    /** Space-delimited granted scopes */
    readonly scope: string;
}
