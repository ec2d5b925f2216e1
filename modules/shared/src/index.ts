/**
 * Authorization Code Service - Shared Utilities
 *
 * Central export for all shared modules used across Lambda functions.
 *
 * Architecture:
 * - This package is a shared dependency for all protocol modules
 * - No hardcoded configuration - all values come from environment variables
 * - Protocol handlers depend on ports; DynamoDB adapters implement them
 *
 * Modules:
 * - Storage Adapters: DynamoDB implementations of the Client Registry and
 *   Authorization Code Store ports
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: HTTP response formatting with security headers
 * - Cookies: session-binding cookie parsing and Set-Cookie builders
 * - Validation: authorization request parameter checks
 * - Crypto: hashing, constant-time comparison, secure random generation
 * - Constants, Errors, Type Guards, Env readers
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 */

// =============================================================================
// Ports and Table Items
// =============================================================================

export type {
    AuthorizationCodeStore,
    ClientRegistry,
    FinalizeResult,
    PendingAuthorization,
    RedeemableCode,
    RedeemFailureReason,
    RedeemResult,
    RegisteredClient,
} from '../../shared_types/api';

export type { AuthCodeItem, ClientItem, PendingAuthorizationItem } from '../../shared_types/schema';

// =============================================================================
// Storage Adapters
// =============================================================================

export {
    getDocClient,
    createDynamoPorts,
    DynamoClientRegistry,
    DynamoAuthorizationCodeStore,
} from './dynamo-client';

export { epochNow, epochToIso } from './storage/types';

export type { StorageAdapterConfig, CodeStoreConfig } from './storage/types';

// Re-export modular storage operations for direct use
export * as storage from './storage';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createSystemLogger,
    createLogger,
    describeError,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Response Helpers
// =============================================================================

export {
    success,
    htmlPage,
    error,
    serverError,
    oauthError,
    redirect,
    buildRedirectUrl,
} from './response';

export type { OAuthErrorBody } from './response';

// =============================================================================
// Cookies
// =============================================================================

export {
    parseCookies,
    getCookie,
    buildSessionCookieHeader,
    buildClearCookieHeader,
} from './cookies';

// =============================================================================
// Validation
// =============================================================================

export {
    isPresent,
    isValidClientId,
    isValidRedirectUri,
    isValidState,
    parseScopes,
    parseScopeParameter,
    joinScopes,
} from './validation';

export type { RedirectUriPolicy } from './validation';

// =============================================================================
// Client Authentication
// =============================================================================

export {
    authenticateClient,
    extractClientCredentials,
    verifyClientSecret,
} from './auth';

export type {
    ClientAuthMethod,
    ClientCredentials,
    ClientAuthResult,
} from './auth';

// =============================================================================
// Cryptographic Utilities
// =============================================================================

export {
    hashToken,
    constantTimeEqual,
    base64UrlEncode,
    generateSecureRandom,
} from './crypto';

// =============================================================================
// Constants
// =============================================================================

export {
    GrantTypes,
    ResponseTypes,
    TokenTypes,
    EntityTypes,
    KeyPrefixes,
    DefaultLifetimes,
    ParameterLimits,
    LOOPBACK_HOSTS,
    DEFAULT_PENDING_COOKIE_NAME,
    JwtAlgorithm,
    ACCESS_TOKEN_JWT_TYPE,
    MIN_SIGNING_SECRET_LENGTH,
} from './constants';

export type {
    GrantType,
    ResponseType,
    TokenType,
    EntityType,
} from './constants';

// =============================================================================
// Errors
// =============================================================================

export {
    AuthorizationErrors,
    TokenErrors,
    HttpStatus,
    ErrorMessages,
} from './errors';

export type {
    AuthorizationErrorCode,
    TokenErrorCode,
    OAuthErrorCode,
    HttpStatusCode,
    ErrorMessageKey,
} from './errors';

// =============================================================================
// Type Guards
// =============================================================================

export {
    isClientItem,
    isPendingAuthorizationItem,
    isAuthCodeItem,
} from './type-guards';

// =============================================================================
// Environment
// =============================================================================

export { requireEnv, readPositiveInt, readList } from './env';

export type { Env } from './env';
