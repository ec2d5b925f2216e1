/**
 * Authorization Endpoint - Type Definitions
 *
 * @module oauth2_authorize/types
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.1
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import type {
    AuthorizationCodeStore,
    AuthorizationErrorCode,
    ClientRegistry,
    ErrorMessageKey,
    RegisteredClient,
} from '@authcode/shared';

// =============================================================================
// Port Types (from shared contracts)
// =============================================================================

export type {
    AuthorizationCodeStore,
    ClientRegistry,
    PendingAuthorization,
    RegisteredClient,
} from '@authcode/shared';

// =============================================================================
// Environment Configuration
// =============================================================================

/** Authorize and confirm handler configuration */
export interface AuthorizeEnvConfig {
    readonly tableName: string;
    readonly region?: string;
    /** How long the resource owner has to decide */
    readonly pendingTtlSeconds: number;
    /** How long an approved code stays redeemable */
    readonly authCodeTtlSeconds: number;
    /** Session-binding cookie name (default: __Host-pending_auth) */
    readonly pendingCookieName: string;
    /** Clients allowed a plaintext http redirect URI on a loopback host */
    readonly loopbackClientIds: readonly string[];
}

// =============================================================================
// Handler Wiring
// =============================================================================

/**
 * Everything a handler needs. Resolved per invocation so a configuration
 * error surfaces as a response instead of a failed cold start.
 */
export interface AuthorizeDependencies {
    readonly registry: ClientRegistry;
    readonly store: AuthorizationCodeStore;
    readonly config: AuthorizeEnvConfig;
    /** Epoch seconds */
    readonly now: () => number;
}

export type HttpHandler = (
    event: APIGatewayProxyEventV2,
    context: Context
) => Promise<APIGatewayProxyResultV2>;

// =============================================================================
// Authorization Request
// =============================================================================

/**
 * Authorization request parameters as received.
 */
export interface RawAuthorizeParams {
    readonly responseType?: string;
    readonly clientId?: string;
    readonly redirectUri?: string;
    readonly scope?: string;
    readonly state?: string;
}

/**
 * A request that passed every check, with its client resolved.
 */
export interface ValidatedAuthorizationRequest {
    readonly clientId: string;
    readonly redirectUri: string;
    readonly scopes: string[];
    readonly state: string;
    readonly client: RegisteredClient;
}

/**
 * A rejection: the wire code and the internal reason, logged only.
 */
export interface Rejection<E extends string = AuthorizationErrorCode> {
    readonly error: E;
    readonly reason: ErrorMessageKey;
}
