/**
 * Client definition files read by the seed script.
 *
 * @module scripts/client-definition
 */

import { isValidClientId, isValidRedirectUri, storage } from '@authcode/shared';

type ClientDefinition = storage.ClientDefinition;

const FIELDS = ['clientId', 'clientName', 'websiteUrl', 'logoUrl', 'redirectUri'] as const;

function readField(raw: object, key: string): string {
    const value = key in raw ? Reflect.get(raw, key) : undefined;
    if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`${key} must be a non-empty string`);
    }
    return value;
}

/**
 * Validate parsed JSON as a client definition.
 *
 * A loopback http redirect is accepted here; whether the authorize
 * endpoint honours it depends on LOOPBACK_CLIENT_IDS.
 *
 * @throws Error naming the first invalid field
 */
export function parseClientDefinition(raw: unknown): ClientDefinition {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('Client definition must be a JSON object');
    }

    const [clientId, clientName, websiteUrl, logoUrl, redirectUri] = FIELDS.map(key => readField(raw, key));

    if (!isValidClientId(clientId)) {
        throw new Error(`clientId "${clientId}" may only contain letters, digits, '.', '_' and '-'`);
    }
    if (!isValidRedirectUri(redirectUri, { allowLoopbackHttp: true })) {
        throw new Error(`redirectUri "${redirectUri}" must be an absolute https URI without a fragment`);
    }

    return { clientId, clientName, websiteUrl, logoUrl, redirectUri };
}
