/**
 * Authorization Request Validator
 *
 * Checks a raw authorization request and resolves its client. Pure apart
 * from the registry read; nothing is written.
 *
 * Checks, in order (fail fast on first violation):
 *   1. response_type is "code"
 *   2. client_id is present and well-formed
 *   3. redirect_uri is an absolute https URI (http only for loopback clients)
 *   4. scope parses into one or more scope tokens
 *   5. state is present (reported as invalid_state)
 *   6. client_id is registered (invalid_client)
 *   7. redirect_uri exactly matches the registered URI
 *
 * Security:
 * - Exact redirect matching prevents open redirects and code theft
 * - Duplicate parameter rejection prevents parameter pollution
 *
 * @module oauth2_authorize/validator
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.1
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-3.1.2.2
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import {
    AuthorizationErrors,
    ResponseTypes,
    isPresent,
    isValidRedirectUri,
    isValidState,
    parseScopeParameter,
} from '@authcode/shared';
import type { AuthorizationErrorCode, ErrorMessageKey } from '@authcode/shared';
import type {
    ClientRegistry,
    RawAuthorizeParams,
    Rejection,
    ValidatedAuthorizationRequest,
} from './types';

// =============================================================================
// Types
// =============================================================================

export type ValidationResult =
    | { readonly valid: true; readonly request: ValidatedAuthorizationRequest }
    | ({ readonly valid: false } & Rejection);

export interface ValidatorPolicy {
    /** Clients allowed a plaintext http redirect URI on a loopback host */
    readonly loopbackClientIds: readonly string[];
}

function reject(error: AuthorizationErrorCode, reason: ErrorMessageKey): ValidationResult {
    return { valid: false, error, reason };
}

// =============================================================================
// Request Parsing
// =============================================================================

export function parseQueryParams(event: APIGatewayProxyEventV2): RawAuthorizeParams {
    const q = event.queryStringParameters || {};

    return {
        responseType: q.response_type,
        clientId: q.client_id,
        redirectUri: q.redirect_uri,
        scope: q.scope,
        state: q.state,
    };
}

/**
 * Names of parameters given more than once.
 *
 * HTTP API v2 joins repeated values with commas in queryStringParameters,
 * so the raw query string is inspected instead.
 */
export function findDuplicateParams(rawQueryString: string | undefined): string[] {
    if (!rawQueryString) {
        return [];
    }

    const paramCounts = new Map<string, number>();
    for (const key of new URLSearchParams(rawQueryString).keys()) {
        paramCounts.set(key, (paramCounts.get(key) || 0) + 1);
    }

    const duplicates: string[] = [];
    for (const [key, count] of paramCounts) {
        if (count > 1) {
            duplicates.push(key);
        }
    }

    return duplicates;
}

// =============================================================================
// Main Validation
// =============================================================================

/**
 * Validate an authorization request and resolve its client.
 */
export async function validateAuthorizationRequest(
    params: RawAuthorizeParams,
    registry: ClientRegistry,
    policy: ValidatorPolicy
): Promise<ValidationResult> {
    const { INVALID_REQUEST, INVALID_STATE, INVALID_CLIENT } = AuthorizationErrors;

    // 1. response_type: REQUIRED, must be 'code'
    if (params.responseType !== ResponseTypes.CODE) {
        return reject(INVALID_REQUEST, 'INVALID_RESPONSE_TYPE');
    }

    // 2. client_id: REQUIRED
    if (!isPresent(params.clientId)) {
        return reject(INVALID_REQUEST, 'MISSING_CLIENT_ID');
    }
    const clientId = params.clientId;

    // 3. redirect_uri: REQUIRED
    if (!isPresent(params.redirectUri)) {
        return reject(INVALID_REQUEST, 'MISSING_REDIRECT_URI');
    }
    const allowLoopbackHttp = policy.loopbackClientIds.includes(clientId);
    if (!isValidRedirectUri(params.redirectUri, { allowLoopbackHttp })) {
        return reject(INVALID_REQUEST, 'INVALID_REDIRECT_URI');
    }
    const redirectUri = params.redirectUri;

    // 4. scope: REQUIRED
    if (!isPresent(params.scope)) {
        return reject(INVALID_REQUEST, 'MISSING_SCOPE');
    }
    const scopes = parseScopeParameter(params.scope);
    if (!scopes) {
        return reject(INVALID_REQUEST, 'INVALID_SCOPE_FORMAT');
    }

    // 5. state: REQUIRED, own error code
    if (!isPresent(params.state)) {
        return reject(INVALID_STATE, 'MISSING_STATE');
    }
    if (!isValidState(params.state)) {
        return reject(INVALID_STATE, 'INVALID_STATE');
    }
    const state = params.state;

    // 6. client must be registered
    const client = await registry.lookup(clientId);
    if (!client) {
        return reject(INVALID_CLIENT, 'UNKNOWN_CLIENT');
    }

    // 7. exact redirect_uri match
    if (client.redirectUri !== redirectUri) {
        return reject(INVALID_REQUEST, 'REDIRECT_URI_MISMATCH');
    }

    return {
        valid: true,
        request: { clientId, redirectUri, scopes, state, client },
    };
}
