/**
 * Authorization Code Service - Standardized HTTP Response Helpers
 *
 * Provides consistent response formatting for all Lambda functions.
 *
 * Key Requirements:
 * - Token responses MUST include Cache-Control: no-store (RFC 6749 Section 5.1)
 * - Error bodies carry the bare wire code: `{"error":"<code>"}`
 * - Every client error is HTTP 400; unexpected failures are HTTP 500
 * - Redirects back to the client use 302 Found
 *
 * Security Headers:
 * - Strict-Transport-Security: Enforces HTTPS connections (HSTS)
 * - X-Content-Type-Options: nosniff - Prevents MIME type sniffing
 * - X-Frame-Options: DENY - Prevents clickjacking
 * - Content-Security-Policy: Restricts resource loading
 * - Cache-Control: no-store - Prevents caching of sensitive responses
 *
 * Note: HTTP API Gateway v2 does not support response header manipulation
 * at the gateway level. Security headers are added at the Lambda response
 * level for consistent enforcement across all endpoints.
 *
 * @see RFC 6749 Section 5.1 - Successful Response (Cache-Control requirement)
 * @see RFC 6749 Section 5.2 - Error Response
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { HttpStatus, TokenErrors } from './errors';
import type { OAuthErrorCode } from './errors';

// =============================================================================
// Response Headers
// =============================================================================

/**
 * Security headers applied to all responses.
 */
const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

/**
 * Standard headers for JSON API responses.
 */
const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

/**
 * Headers for the consent page. Client logos may load from any https
 * origin. Inline styles only, no scripts.
 */
const HTML_HEADERS = {
    'Content-Type': 'text/html; charset=utf-8',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
    'Content-Security-Policy': "default-src 'none'; img-src https:; style-src 'unsafe-inline'; form-action 'self'; frame-ancestors 'none'",
} as const;

/**
 * Headers for redirect responses.
 */
const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @example
 * ```typescript
 * return success({ access_token: 'xxx', token_type: 'Bearer', expires_in: 3600 });
 * ```
 */
export function success<T>(body: T, statusCode: number = HttpStatus.OK): APIGatewayProxyResultV2 {
    return {
        statusCode,
        headers: JSON_HEADERS,
        body: JSON.stringify(body),
    };
}

/**
 * Return an HTML page, optionally setting a cookie.
 */
export function htmlPage(html: string, setCookieHeader?: string): APIGatewayProxyResultV2 {
    const headers: Record<string, string> = { ...HTML_HEADERS };
    if (setCookieHeader) {
        headers['Set-Cookie'] = setCookieHeader;
    }

    return {
        statusCode: HttpStatus.OK,
        headers,
        body: html,
    };
}

// =============================================================================
// Error Responses
// =============================================================================

/**
 * Error response body. Only the code is ever sent.
 */
export interface OAuthErrorBody {
    error: OAuthErrorCode;
}

/**
 * Return an error response with the bare error code.
 *
 * @example
 * ```typescript
 * return error(400, 'invalid_request');
 * ```
 */
export function error(statusCode: number, errorCode: OAuthErrorCode): APIGatewayProxyResultV2 {
    const body: OAuthErrorBody = { error: errorCode };

    return {
        statusCode,
        headers: JSON_HEADERS,
        body: JSON.stringify(body),
    };
}

/**
 * 500 Internal Server Error.
 */
export function serverError(): APIGatewayProxyResultV2 {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, TokenErrors.SERVER_ERROR);
}

/**
 * Response for any wire code: 500 for server_error, 400 for the rest.
 */
export function oauthError(errorCode: OAuthErrorCode): APIGatewayProxyResultV2 {
    return errorCode === TokenErrors.SERVER_ERROR
        ? serverError()
        : error(HttpStatus.BAD_REQUEST, errorCode);
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * Return a redirect response, 302 Found unless told otherwise.
 *
 * @example
 * ```typescript
 * return redirect('https://client.example.com/callback?code=xyz&state=abc');
 * ```
 */
export function redirect(
    url: string,
    setCookieHeader?: string,
    statusCode: number = HttpStatus.FOUND
): APIGatewayProxyResultV2 {
    const headers: Record<string, string> = {
        ...REDIRECT_HEADERS,
        Location: url,
    };
    if (setCookieHeader) {
        headers['Set-Cookie'] = setCookieHeader;
    }

    return {
        statusCode,
        headers,
        body: '',
    };
}

/**
 * Build the client redirect URL, keeping any query the registered URI
 * already carries.
 */
export function buildRedirectUrl(redirectUri: string, params: Record<string, string>): string {
    const url = new URL(redirectUri);
    for (const [name, value] of Object.entries(params)) {
        url.searchParams.set(name, value);
    }
    return url.toString();
}
