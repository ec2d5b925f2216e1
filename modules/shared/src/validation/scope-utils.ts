/**
 * Authorization Code Service - Scope Parsing
 *
 * Scopes are passed through to the token unchanged; no scope carries
 * meaning to this service.
 *
 * @see RFC 6749 Section 3.3 - Access Token Scope
 * @see RFC 6749 Appendix A.4 - scope ABNF
 */

import { ParameterLimits } from '../constants';

// =============================================================================
// Constants
// =============================================================================

/**
 * Regex pattern for valid scope token characters.
 * Per RFC 6749 ABNF: %x21 / %x23-5B / %x5D-7E
 * (printable ASCII except space, backslash, and double-quote)
 */
const SCOPE_TOKEN_PATTERN = /^[\x21\x23-\x5B\x5D-\x7E]+$/;

// =============================================================================
// Scope Parsing
// =============================================================================

/**
 * Parse a whitespace-delimited scope string into an array.
 * Runs of whitespace are a single delimiter; duplicates are dropped
 * and request order is kept.
 *
 * @example
 * ```typescript
 * parseScopes('read write')        // ['read', 'write']
 * parseScopes(' read  read\twrite') // ['read', 'write']
 * ```
 */
export function parseScopes(scope: string): string[] {
    const scopes = scope.split(/\s+/).filter(s => s.length > 0);
    return [...new Set(scopes)];
}

/**
 * Parse and validate a scope parameter.
 *
 * @returns The scope tokens, or null when the parameter is missing, too
 * long, empty after parsing, or holds a character outside the ABNF.
 *
 * @example
 * ```typescript
 * parseScopeParameter('read write')  // ['read', 'write']
 * parseScopeParameter('   ')         // null
 * parseScopeParameter('read "x"')    // null
 * ```
 */
export function parseScopeParameter(scope: string | undefined | null): string[] | null {
    if (typeof scope !== 'string' || scope.length > ParameterLimits.SCOPE_MAX_LENGTH) {
        return null;
    }

    const scopes = parseScopes(scope);
    if (scopes.length === 0) {
        return null;
    }

    return scopes.every(s => SCOPE_TOKEN_PATTERN.test(s)) ? scopes : null;
}

/**
 * Join an array of scopes into a space-delimited string.
 */
export function joinScopes(scopes: string[]): string {
    return scopes.join(' ');
}
