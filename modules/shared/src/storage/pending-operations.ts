/**
 * Authorization Code Service - Pending Authorization Storage Operations
 *
 * DynamoDB operations for pending authorizations.
 *
 * Key Pattern:
 *   PK: PENDING#<sha256(session_token)>
 *   SK: METADATA
 *
 * Lifecycle:
 *   1. Created by GET /auth (put if absent)
 *   2. Read by GET /confirm_auth to check client_id and state
 *   3. Deleted by the consent transaction, which on approval also writes
 *      the redeemable code record
 *
 * @module storage/pending-operations
 */

import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import type { FinalizeResult, PendingAuthorization } from '../../../shared_types/api';
import type { PendingAuthorizationItem } from '../../../shared_types/schema';
import { EntityTypes, KeyPrefixes } from '../constants';
import { generateRequestToken, hashToken } from '../crypto';
import { isPendingAuthorizationItem } from '../type-guards';
import { joinScopes, parseScopes } from '../validation/scope-utils';
import { buildAuthCodeItem } from './auth-code-operations';
import { toRedeemableCode } from './redemption';
import { withRetry } from './retry';
import { epochToIso, isoToEpoch } from './types';

// =============================================================================
// Item Mapping
// =============================================================================

/**
 * Partition key for a session token. The raw token never reaches storage.
 */
export function pendingKey(sessionToken: string): `PENDING#${string}` {
    return `${KeyPrefixes.PENDING}${hashToken(sessionToken)}`;
}

export function buildPendingItem(
    sessionToken: string,
    pending: PendingAuthorization
): PendingAuthorizationItem {
    const createdAt = epochToIso(pending.createdAt);
    return {
        PK: pendingKey(sessionToken),
        SK: 'METADATA',
        entityType: EntityTypes.PENDING_AUTHORIZATION,
        ttl: pending.expiresAt,
        sessionTokenHash: hashToken(sessionToken),
        code: pending.code,
        csrfToken: pending.csrfToken,
        clientId: pending.clientId,
        scope: joinScopes(pending.scopes),
        state: pending.state,
        redirectUri: pending.redirectUri,
        expiresAt: epochToIso(pending.expiresAt),
        createdAt,
        updatedAt: createdAt,
    };
}

export function toPendingAuthorization(item: PendingAuthorizationItem): PendingAuthorization {
    return {
        code: item.code,
        csrfToken: item.csrfToken,
        clientId: item.clientId,
        scopes: parseScopes(item.scope),
        state: item.state,
        redirectUri: item.redirectUri,
        createdAt: isoToEpoch(item.createdAt),
        expiresAt: item.ttl,
    };
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Save a new pending authorization.
 * Fails with ConditionalCheckFailedException if the key already exists.
 */
export async function savePendingAuthorization(
    client: DynamoDBDocumentClient,
    tableName: string,
    item: PendingAuthorizationItem
): Promise<void> {
    await withRetry(async () => {
        return client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        );
    });
}

/**
 * Retrieve a live pending authorization.
 *
 * DynamoDB TTL deletion is lazy, so an expired item may still be returned
 * by the table; it is treated as absent here.
 *
 * @returns The item, or null if absent or expired
 */
export async function getPendingAuthorization(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionToken: string,
    now: number
): Promise<PendingAuthorizationItem | null> {
    const result = await withRetry(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: pendingKey(sessionToken),
                    SK: 'METADATA',
                },
                ConsistentRead: true,
            })
        );
    });

    if (!isPendingAuthorizationItem(result.Item) || result.Item.ttl <= now) {
        return null;
    }

    return result.Item;
}

/**
 * Consume a pending authorization in one transaction.
 *
 * The delete is conditioned on the record existing and being unexpired, so
 * a second confirmation (or one that lost a race) finds nothing. On approval
 * the code record is put in the same transaction.
 *
 * Retries reuse one `ClientRequestToken`, so a transaction that committed
 * before its response was lost is acknowledged again instead of failing
 * its own condition.
 *
 * @param authCodeTtlSeconds - Lifetime of the code once approved
 */
export async function finalizePendingAuthorization(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionToken: string,
    approved: boolean,
    now: number,
    authCodeTtlSeconds: number
): Promise<FinalizeResult> {
    const item = await getPendingAuthorization(client, tableName, sessionToken, now);
    if (!item) {
        return { outcome: 'expired_or_absent' };
    }

    const codeItem = approved
        ? buildAuthCodeItem(toPendingAuthorization(item), now, authCodeTtlSeconds)
        : null;

    const requestToken = generateRequestToken();

    try {
        await withRetry(async () => {
            return client.send(
                new TransactWriteCommand({
                    ClientRequestToken: requestToken,
                    TransactItems: [
                        {
                            Delete: {
                                TableName: tableName,
                                Key: { PK: item.PK, SK: item.SK },
                                ConditionExpression: 'attribute_exists(PK) AND #ttl > :now',
                                ExpressionAttributeNames: { '#ttl': 'ttl' },
                                ExpressionAttributeValues: { ':now': now },
                            },
                        },
                        ...(codeItem
                            ? [{
                                Put: {
                                    TableName: tableName,
                                    Item: codeItem,
                                    ConditionExpression: 'attribute_not_exists(PK)',
                                },
                            }]
                            : []),
                    ],
                })
            );
        });
    } catch (error) {
        // Index 0 is the delete; a failed condition there means the pending
        // authorization is gone.
        if (
            error instanceof TransactionCanceledException &&
            error.CancellationReasons?.[0]?.Code === 'ConditionalCheckFailed'
        ) {
            return { outcome: 'expired_or_absent' };
        }
        throw error;
    }

    if (!codeItem) {
        return { outcome: 'denied' };
    }

    return { outcome: 'approved', code: toRedeemableCode(codeItem) };
}
