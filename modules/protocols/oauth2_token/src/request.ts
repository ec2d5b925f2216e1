/**
 * Token Endpoint - Request Body Parsing
 *
 * Accepts application/x-www-form-urlencoded (RFC 6749 Section 4.1.3) and,
 * for clients that cannot send forms, a flat JSON object. Both become a
 * URLSearchParams so the grant handler reads one shape.
 *
 * @module oauth2_token/request
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { ErrorMessageKey } from '@authcode/shared';

export type ParsedTokenRequest =
    | { readonly ok: true; readonly params: URLSearchParams }
    | { readonly ok: false; readonly reason: ErrorMessageKey; readonly duplicates?: string[] };

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
const JSON_CONTENT_TYPE = 'application/json';

/**
 * Get the request body, decoding it when API Gateway base64-encoded it.
 */
export function getRawBody(event: APIGatewayProxyEventV2): string {
    const body = event.body || '';
    return event.isBase64Encoded ? Buffer.from(body, 'base64').toString('utf-8') : body;
}

/**
 * Media type of the request without parameters such as charset.
 * HTTP API v2 lowercases header names.
 */
function mediaType(event: APIGatewayProxyEventV2): string {
    const contentType = event.headers?.['content-type'] || '';
    return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * Parameter names given more than once in a form body.
 */
export function findDuplicateFormParams(params: URLSearchParams): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const key of params.keys()) {
        if (seen.has(key)) {
            duplicates.add(key);
        }
        seen.add(key);
    }
    return [...duplicates];
}

function parseJsonBody(body: string): URLSearchParams | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (err) {
        if (err instanceof SyntaxError) {
            return null;
        }
        throw err;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return null;
    }

    // Non-string members are treated as absent
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') {
            params.set(key, value);
        }
    }
    return params;
}

/**
 * Parse the token request body.
 */
export function parseTokenRequest(event: APIGatewayProxyEventV2): ParsedTokenRequest {
    const type = mediaType(event);
    const body = getRawBody(event);

    if (type === FORM_CONTENT_TYPE) {
        const params = new URLSearchParams(body);
        const duplicates = findDuplicateFormParams(params);
        if (duplicates.length > 0) {
            return { ok: false, reason: 'DUPLICATE_PARAMETER', duplicates };
        }
        return { ok: true, params };
    }

    if (type === JSON_CONTENT_TYPE) {
        const params = parseJsonBody(body);
        return params ? { ok: true, params } : { ok: false, reason: 'MALFORMED_BODY' };
    }

    return { ok: false, reason: 'MALFORMED_BODY' };
}
