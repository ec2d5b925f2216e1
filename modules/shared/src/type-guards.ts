/**
 * Authorization Code Service - Type Guards
 *
 * Runtime type guards for DynamoDB items. `GetCommand` hands back an
 * untyped record; these guards narrow it to an entity interface.
 *
 * Each guard validates:
 * - entityType discriminator matches expected value
 * - PK prefix and SK value match the entity's key pattern
 * - Every attribute the protocol reads has the expected primitive type
 *
 * Usage:
 * ```typescript
 * const result = await client.send(new GetCommand({ ... }));
 * if (isClientItem(result.Item)) {
 *   // TypeScript knows result.Item is ClientItem here
 * }
 * ```
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type { ClientItem } from '../../shared_types/client';
import type { PendingAuthorizationItem } from '../../shared_types/pending';
import type { AuthCodeItem } from '../../shared_types/token';
import { EntityTypes, KeyPrefixes } from './constants';

// =============================================================================
// Field Readers
// =============================================================================

function field(item: object, key: string): unknown {
    return key in item ? Reflect.get(item, key) : undefined;
}

function isObject(value: unknown): value is object {
    return typeof value === 'object' && value !== null;
}

function hasStrings(item: object, keys: readonly string[]): boolean {
    return keys.every(key => typeof field(item, key) === 'string');
}

function hasKeys(item: object, entityType: string, prefix: string, sk: string): boolean {
    const pk = field(item, 'PK');
    return (
        field(item, 'entityType') === entityType &&
        typeof pk === 'string' &&
        pk.startsWith(prefix) &&
        field(item, 'SK') === sk &&
        hasStrings(item, ['createdAt', 'updatedAt'])
    );
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Key Pattern: PK=CLIENT#<client_id>, SK=CONFIG
 */
export function isClientItem(item: unknown): item is ClientItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.CLIENT, KeyPrefixes.CLIENT, 'CONFIG') &&
        hasStrings(item, ['clientId', 'clientName', 'websiteUrl', 'logoUrl', 'redirectUri', 'clientSecretHash'])
    );
}

/**
 * Key Pattern: PK=PENDING#<session_token_hash>, SK=METADATA
 */
export function isPendingAuthorizationItem(item: unknown): item is PendingAuthorizationItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.PENDING_AUTHORIZATION, KeyPrefixes.PENDING, 'METADATA') &&
        typeof field(item, 'ttl') === 'number' &&
        hasStrings(item, [
            'sessionTokenHash',
            'code',
            'csrfToken',
            'clientId',
            'scope',
            'state',
            'redirectUri',
            'expiresAt',
        ])
    );
}

/**
 * Key Pattern: PK=CODE#<code>, SK=METADATA
 */
export function isAuthCodeItem(item: unknown): item is AuthCodeItem {
    return (
        isObject(item) &&
        hasKeys(item, EntityTypes.AUTH_CODE, KeyPrefixes.CODE, 'METADATA') &&
        typeof field(item, 'ttl') === 'number' &&
        typeof field(item, 'used') === 'boolean' &&
        hasStrings(item, ['code', 'clientId', 'scope', 'redirectUri', 'issuedAt', 'expiresAt'])
    );
}
