/**
 * Authorization Code Service - Authorization Code Storage Operations
 *
 * DynamoDB operations for redeemable authorization codes.
 * Implements single-use semantics with conditional updates.
 *
 * Key Pattern:
 *   PK: CODE#<code>
 *   SK: METADATA
 *
 * Codes are written by the consent transaction (see pending-operations.ts)
 * and claimed here.
 *
 * @module storage/auth-code-operations
 */

import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { PendingAuthorization, RedeemResult } from '../../../shared_types/api';
import type { AuthCodeItem } from '../../../shared_types/schema';
import { EntityTypes, KeyPrefixes } from '../constants';
import { generateRequestToken } from '../crypto';
import { isAuthCodeItem } from '../type-guards';
import { joinScopes } from '../validation/scope-utils';
import { classifyRedemption, toRedeemableCode } from './redemption';
import { withRetry } from './retry';
import { epochToIso } from './types';

/**
 * Build the redeemable code record for an approved pending authorization.
 *
 * @param pending - The approved pending authorization
 * @param now - Approval time (epoch seconds)
 * @param ttlSeconds - Code lifetime
 *
 * @see RFC 6749 Section 4.1.2 - Codes SHOULD expire shortly after issuance
 */
export function buildAuthCodeItem(
    pending: PendingAuthorization,
    now: number,
    ttlSeconds: number
): AuthCodeItem {
    const issuedAt = epochToIso(now);
    const expiresAt = now + ttlSeconds;
    return {
        PK: `${KeyPrefixes.CODE}${pending.code}`,
        SK: 'METADATA',
        entityType: EntityTypes.AUTH_CODE,
        ttl: expiresAt,
        code: pending.code,
        clientId: pending.clientId,
        scope: joinScopes(pending.scopes),
        redirectUri: pending.redirectUri,
        used: false,
        issuedAt,
        expiresAt: epochToIso(expiresAt),
        createdAt: issuedAt,
        updatedAt: issuedAt,
    };
}

/**
 * Retrieve an authorization code.
 *
 * @returns AuthCodeItem or null if not found
 */
export async function getAuthCode(
    client: DynamoDBDocumentClient,
    tableName: string,
    code: string
): Promise<AuthCodeItem | null> {
    const result = await withRetry(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.CODE}${code}`,
                    SK: 'METADATA',
                },
                ConsistentRead: true,
            })
        );
    });

    return isAuthCodeItem(result.Item) ? result.Item : null;
}

/**
 * Claim an authorization code for one client and redirect URI.
 *
 * The read classifies the failure; the conditional update repeats every
 * check, so two concurrent claims cannot both succeed.
 *
 * Each call stamps the code with its own claim id. When a retried update
 * fails its condition on a code carrying that id, the earlier attempt
 * committed and the claim stands.
 *
 * If a code is presented again after it was claimed, the request is
 * denied (RFC 6749 Section 4.1.2).
 */
export async function redeemAuthCode(
    client: DynamoDBDocumentClient,
    tableName: string,
    clientId: string,
    code: string,
    redirectUri: string,
    now: number
): Promise<RedeemResult> {
    const item = await getAuthCode(client, tableName, code);
    const failure = classifyRedemption(item, clientId, redirectUri, now);
    if (failure || !item) {
        return { ok: false, reason: failure ?? 'not_found' };
    }

    const claimId = generateRequestToken();

    try {
        await withRetry(async () => {
            return client.send(
                new UpdateCommand({
                    TableName: tableName,
                    Key: {
                        PK: item.PK,
                        SK: item.SK,
                    },
                    UpdateExpression:
                        'SET #used = :true, usedAt = :usedAt, updatedAt = :usedAt, claimId = :claimId',
                    ConditionExpression:
                        'attribute_exists(PK) AND #used = :false AND clientId = :clientId ' +
                        'AND redirectUri = :redirectUri AND #ttl > :now',
                    ExpressionAttributeNames: {
                        '#used': 'used',
                        '#ttl': 'ttl',
                    },
                    ExpressionAttributeValues: {
                        ':true': true,
                        ':false': false,
                        ':clientId': clientId,
                        ':redirectUri': redirectUri,
                        ':now': now,
                        ':usedAt': epochToIso(now),
                        ':claimId': claimId,
                    },
                    ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
                })
            );
        });
    } catch (error) {
        if (error instanceof ConditionalCheckFailedException) {
            // The item in the error is in wire format
            if (error.Item?.claimId?.S === claimId) {
                return { ok: true, code: toRedeemableCode(item) };
            }
            // Another request claimed the code between the read and the update
            return { ok: false, reason: 'already_used' };
        }
        throw error;
    }

    return { ok: true, code: toRedeemableCode(item) };
}
