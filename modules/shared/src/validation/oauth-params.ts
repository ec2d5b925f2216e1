/**
 * Authorization Code Service - Request Parameter Validation
 *
 * Validation functions for authorization request parameters.
 *
 * Security Principles:
 * - Strict character whitelisting prevents injection attacks
 * - Length limits are checked before parsing
 * - Type guards narrow `string | undefined` for callers
 * - All validation fails closed (reject if not explicitly valid)
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 * @see RFC 8252 - OAuth 2.0 for Native Apps
 */

import { LOOPBACK_HOSTS, ParameterLimits } from '../constants';

// =============================================================================
// Constants
// =============================================================================

/**
 * Regex pattern for valid client_id characters.
 * Allows alphanumeric, hyphens, underscores, and periods.
 * Periods support reverse-domain style IDs per RFC 8252.
 */
const CLIENT_ID_PATTERN = /^[a-zA-Z0-9._-]+$/;

// =============================================================================
// Presence
// =============================================================================

/**
 * True for a string with at least one character.
 */
export function isPresent(value: string | undefined | null): value is string {
    return typeof value === 'string' && value.length > 0;
}

// =============================================================================
// Client ID Validation
// =============================================================================

/**
 * Validate a client_id parameter.
 *
 * Per RFC 6749 Section 2.2, client_id is a unique string issued by the
 * authorization server. Allowed: A-Z, a-z, 0-9, hyphen, underscore, period.
 *
 * @see RFC 6749 Section 2.2 - Client Identifier
 * @see RFC 8252 Section 7.1 - Native App Client Identifiers
 */
export function isValidClientId(clientId: string | undefined | null): clientId is string {
    if (!isPresent(clientId)) {
        return false;
    }

    if (clientId.length > ParameterLimits.CLIENT_ID_MAX_LENGTH) {
        return false;
    }

    return CLIENT_ID_PATTERN.test(clientId);
}

// =============================================================================
// Redirect URI Validation
// =============================================================================

export interface RedirectUriPolicy {
    /** Permit `http:` on a loopback host */
    allowLoopbackHttp: boolean;
}

/**
 * Validate a redirect_uri parameter.
 *
 * Checks the URI is absolute and well-formed. Registration is checked
 * separately by exact match.
 *
 * Security Requirements:
 * - HTTPS required
 * - HTTP allowed only on a loopback host, and only when the policy allows it
 * - No fragments (RFC 6749 Section 3.1.2)
 * - Length limit enforced before parsing
 *
 * @see RFC 6749 Section 3.1.2 - Redirection Endpoint
 * @see RFC 8252 Section 7.3 - Loopback Interface Redirection
 */
export function isValidRedirectUri(
    uri: string | undefined | null,
    policy: RedirectUriPolicy
): uri is string {
    if (!isPresent(uri)) {
        return false;
    }

    if (uri.length > ParameterLimits.REDIRECT_URI_MAX_LENGTH) {
        return false;
    }

    let parsed: URL;
    try {
        parsed = new URL(uri);
    } catch {
        return false;
    }

    // A bare '#' parses to an empty hash, so look at the raw string too
    if (parsed.hash || uri.includes('#')) {
        return false;
    }

    if (parsed.protocol === 'https:') {
        return parsed.hostname.length > 0;
    }

    if (parsed.protocol === 'http:') {
        return policy.allowLoopbackHttp && LOOPBACK_HOSTS.includes(parsed.hostname);
    }

    return false;
}

// =============================================================================
// State Parameter Validation
// =============================================================================

/**
 * Validate a state parameter. Required and bounded.
 *
 * @see RFC 6749 Section 10.12 - Cross-Site Request Forgery
 */
export function isValidState(state: string | undefined | null): state is string {
    return isPresent(state) && state.length <= ParameterLimits.STATE_MAX_LENGTH;
}
