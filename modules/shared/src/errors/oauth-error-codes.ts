/**
 * Authorization Code Service - Wire Error Codes
 *
 * The fixed vocabulary sent in the `error` field. Nothing else is ever
 * placed in an error body.
 *
 * @see RFC 6749 Section 4.1.2.1 - Authorization Error Response
 * @see RFC 6749 Section 5.2 - Token Error Response
 */

// =============================================================================
// Authorization Endpoint Error Codes
// =============================================================================

export const AuthorizationErrors = {
    /** The request is missing a required parameter or is otherwise malformed */
    INVALID_REQUEST: 'invalid_request',

    /** The state parameter is missing or malformed */
    INVALID_STATE: 'invalid_state',

    /** The client_id is not registered */
    INVALID_CLIENT: 'invalid_client',

    /** The resource owner denied the request */
    ACCESS_DENIED: 'access_denied',

    /** The authorization server encountered an unexpected condition */
    SERVER_ERROR: 'server_error',
} as const;

export type AuthorizationErrorCode = typeof AuthorizationErrors[keyof typeof AuthorizationErrors];

// =============================================================================
// Token Endpoint Error Codes
// =============================================================================

export const TokenErrors = {
    /** The request is missing a required parameter or is otherwise malformed */
    INVALID_REQUEST: 'invalid_request',

    /** Client authentication failed */
    INVALID_CLIENT: 'invalid_client',

    /** The authorization code is invalid, expired, used, or bound elsewhere */
    INVALID_GRANT: 'invalid_grant',

    /** The authorization grant type is not supported by the authorization server */
    UNSUPPORTED_GRANT_TYPE: 'unsupported_grant_type',

    /** The authorization server encountered an unexpected condition */
    SERVER_ERROR: 'server_error',
} as const;

export type TokenErrorCode = typeof TokenErrors[keyof typeof TokenErrors];

// =============================================================================
// Union Type
// =============================================================================

export type OAuthErrorCode = AuthorizationErrorCode | TokenErrorCode;
