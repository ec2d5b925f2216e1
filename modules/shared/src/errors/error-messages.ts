/**
 * Authorization Code Service - Error Messages
 *
 * Human-readable descriptions of each rejection. They go to the structured
 * log only; error bodies carry the bare code.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Authorization Endpoint
    // -------------------------------------------------------------------------

    DUPLICATE_PARAMETER: 'A request parameter was given more than once',

    INVALID_RESPONSE_TYPE: 'response_type must be "code"',

    MISSING_CLIENT_ID: 'Missing required parameter: client_id',

    MISSING_REDIRECT_URI: 'Missing required parameter: redirect_uri',

    INVALID_REDIRECT_URI: 'redirect_uri is malformed or uses an insecure protocol',

    MISSING_SCOPE: 'Missing required parameter: scope',

    INVALID_SCOPE_FORMAT: 'Scope parameter contains invalid characters',

    MISSING_STATE: 'Missing required parameter: state',

    INVALID_STATE: 'state parameter is too long',

    UNKNOWN_CLIENT: 'Unknown client_id',

    REDIRECT_URI_MISMATCH: 'redirect_uri does not match the registered URI for this client',

    // -------------------------------------------------------------------------
    // Consent
    // -------------------------------------------------------------------------

    MISSING_PENDING_COOKIE: 'No pending authorization cookie',

    INVALID_DECISION: 'authorize must be true or false',

    PENDING_NOT_FOUND: 'Pending authorization is unknown or expired',

    PENDING_MISMATCH: 'client_id or state does not match the pending authorization',

    CSRF_TOKEN_MISMATCH: 'csrf_token is missing or does not match the consent form',

    // -------------------------------------------------------------------------
    // Token Endpoint
    // -------------------------------------------------------------------------

    UNSUPPORTED_GRANT: 'The authorization grant type is not supported',

    MALFORMED_BODY: 'Request body is not form-encoded or a JSON object',

    MISSING_TOKEN_PARAMETERS: 'Missing required parameter: client_id, client_secret, code or redirect_uri',

    CLIENT_AUTH_FAILED: 'Client authentication failed',

    INVALID_CODE: 'Authorization code is invalid or expired',

    CODE_ALREADY_USED: 'Authorization code has already been used',

    CODE_EXPIRED: 'Authorization code has expired',

    CODE_CLIENT_MISMATCH: 'Authorization code was issued to another client',

    CODE_REDIRECT_MISMATCH: 'redirect_uri does not match the authorization request',

    // -------------------------------------------------------------------------
    // General
    // -------------------------------------------------------------------------

    INTERNAL_ERROR: 'An unexpected error occurred',
} as const;

export type ErrorMessageKey = keyof typeof ErrorMessages;
