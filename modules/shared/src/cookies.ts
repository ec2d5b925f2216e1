/**
 * Authorization Code Service - Cookie Helpers
 *
 * The pending-authorization cookie binds the browser session to the code
 * minted by GET /auth. It is a lookup key only; expiry is enforced by the
 * store, not by Max-Age.
 *
 * @see RFC 6265bis Section 4.1.3 - Cookie Name Prefixes
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse cookies from a Cookie header value.
 *
 * @returns Map of cookie name to value
 */
export function parseCookies(cookieHeader: string | undefined): Map<string, string> {
    const cookies = new Map<string, string>();
    if (!cookieHeader) return cookies;

    const pairs = cookieHeader.split(';');
    for (const pair of pairs) {
        const [name, ...valueParts] = pair.trim().split('=');
        if (name) {
            cookies.set(name, valueParts.join('='));
        }
    }
    return cookies;
}

/**
 * Read one cookie from an HTTP API event. Payload 2.0 moves cookies into
 * `event.cookies`; the raw header is the fallback.
 */
export function getCookie(event: APIGatewayProxyEventV2, cookieName: string): string | undefined {
    const cookieHeader = event.cookies?.join('; ') || event.headers?.cookie;
    const value = parseCookies(cookieHeader).get(cookieName);
    return value ? value : undefined;
}

// =============================================================================
// Set-Cookie Builders
// =============================================================================

/**
 * Build a Set-Cookie header for a session-binding cookie.
 *
 * - HttpOnly: Prevents JavaScript access (XSS protection)
 * - Secure: Only sent over HTTPS
 * - SameSite=Strict: never sent on a navigation started by another site,
 *   so only the consent page itself can submit the decision
 *
 * If the cookie name starts with __Host-, the Domain attribute is omitted.
 */
export function buildSessionCookieHeader(
    cookieName: string,
    value: string,
    maxAgeSeconds: number,
    domain?: string
): string {
    const parts = [
        `${cookieName}=${value}`,
        `Max-Age=${maxAgeSeconds}`,
        'Path=/',
        'HttpOnly',
        'Secure',
        'SameSite=Strict',
    ];

    if (domain && !cookieName.startsWith('__Host-')) {
        parts.push(`Domain=${domain}`);
    }

    return parts.join('; ');
}

/**
 * Build a Set-Cookie header that expires the cookie immediately.
 */
export function buildClearCookieHeader(cookieName: string, domain?: string): string {
    return buildSessionCookieHeader(cookieName, '', 0, domain);
}
