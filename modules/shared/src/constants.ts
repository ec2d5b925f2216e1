/**
 * Authorization Code Service - Constants
 *
 * Protocol literals, DynamoDB key prefixes and default lifetimes.
 * Runtime configuration (TTLs, cookie name, signing key) comes from
 * environment variables; see each protocol module's `config.ts`.
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 */

// =============================================================================
// Grant and Response Types
// =============================================================================

/**
 * Grant types accepted at the token endpoint.
 *
 * @see RFC 6749 Section 4.1.3 - Access Token Request
 */
export const GrantTypes = {
    AUTHORIZATION_CODE: 'authorization_code',
} as const;

export type GrantType = typeof GrantTypes[keyof typeof GrantTypes];

/**
 * Response types accepted at the authorization endpoint.
 *
 * @see RFC 6749 Section 4.1.1 - Authorization Request
 */
export const ResponseTypes = {
    CODE: 'code',
} as const;

export type ResponseType = typeof ResponseTypes[keyof typeof ResponseTypes];

/**
 * @see RFC 6750 - Bearer Token Usage
 */
export const TokenTypes = {
    BEARER: 'Bearer',
} as const;

export type TokenType = typeof TokenTypes[keyof typeof TokenTypes];

// =============================================================================
// DynamoDB Entity Types
// =============================================================================

/**
 * Entity type discriminators for Single Table Design.
 */
export const EntityTypes = {
    CLIENT: 'CLIENT',
    PENDING_AUTHORIZATION: 'PENDING_AUTHORIZATION',
    AUTH_CODE: 'AUTH_CODE',
} as const;

export type EntityType = typeof EntityTypes[keyof typeof EntityTypes];

// =============================================================================
// DynamoDB Key Prefixes
// =============================================================================

/**
 * Partition key prefixes for Single Table Design.
 * Format: PREFIX#<identifier>
 */
export const KeyPrefixes = {
    CLIENT: 'CLIENT#',
    PENDING: 'PENDING#',
    CODE: 'CODE#',
} as const;

// =============================================================================
// Default Lifetimes (in seconds)
// =============================================================================

/**
 * Default lifetimes in seconds, overridable per deployment.
 *
 * - Pending authorization (1 hour): time the resource owner has to decide
 * - Authorization code (10 minutes): codes SHOULD expire shortly after issuance
 * - Access token (1 hour): `exp - iat` and `expires_in` both use this value
 *
 * @see RFC 6749 Section 4.1.2 - Authorization code expiration
 */
export const DefaultLifetimes = {
    PENDING_AUTHORIZATION: 3600,
    AUTHORIZATION_CODE: 600,
    ACCESS_TOKEN: 3600,
} as const;

// =============================================================================
// Parameter Limits
// =============================================================================

/**
 * Upper bounds on authorization request parameters.
 */
export const ParameterLimits = {
    CLIENT_ID_MAX_LENGTH: 256,
    REDIRECT_URI_MAX_LENGTH: 2048,
    SCOPE_MAX_LENGTH: 1024,
    STATE_MAX_LENGTH: 512,
} as const;

/**
 * Hosts for which a plaintext `http:` redirect URI may be registered,
 * and only for clients on the loopback allow-list.
 *
 * @see RFC 8252 Section 7.3 - Loopback Interface Redirection
 */
export const LOOPBACK_HOSTS: readonly string[] = ['localhost', '127.0.0.1', '[::1]'];

// =============================================================================
// Cookies
// =============================================================================

/**
 * The `__Host-` prefix requires Secure, Path=/ and no Domain attribute.
 */
export const DEFAULT_PENDING_COOKIE_NAME = '__Host-pending_auth';

// =============================================================================
// JWT
// =============================================================================

/**
 * @see RFC 7518 Section 3.2 - HMAC with SHA-2 Functions
 * @see RFC 9068 Section 2.1 - JWT access token header
 */
export const JwtAlgorithm = {
    HS256: 'HS256',
} as const;

export const ACCESS_TOKEN_JWT_TYPE = 'at+jwt';

/** Minimum length of the HS256 signing secret */
export const MIN_SIGNING_SECRET_LENGTH = 32;
