/**
 * Authorization Code Service - Client Storage Operations
 *
 * DynamoDB operations for registered clients.
 *
 * Key Pattern:
 *   PK: CLIENT#<client_id>
 *   SK: CONFIG
 *
 * @module storage/client-operations
 */

import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { ClientItem } from '../../../shared_types/schema';
import { EntityTypes, KeyPrefixes } from '../constants';
import { isClientItem } from '../type-guards';
import { withRetry } from './retry';

/**
 * Public registration data of a client. The secret is supplied separately
 * and only its hash is kept.
 */
export interface ClientDefinition {
    clientId: string;
    clientName: string;
    websiteUrl: string;
    logoUrl: string;
    redirectUri: string;
}

/**
 * Build the stored record for a client.
 *
 * @param definition - Public registration data
 * @param clientSecretHash - SHA-256 hex digest of the client secret
 * @param now - Creation time
 */
export function buildClientItem(
    definition: ClientDefinition,
    clientSecretHash: string,
    now: Date
): ClientItem {
    const timestamp = now.toISOString();
    return {
        PK: `${KeyPrefixes.CLIENT}${definition.clientId}`,
        SK: 'CONFIG',
        entityType: EntityTypes.CLIENT,
        clientId: definition.clientId,
        clientName: definition.clientName,
        websiteUrl: definition.websiteUrl,
        logoUrl: definition.logoUrl,
        redirectUri: definition.redirectUri,
        clientSecretHash,
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

/**
 * Retrieve a client by its client_id.
 *
 * @returns ClientItem or null if not found
 */
export async function getClient(
    client: DynamoDBDocumentClient,
    tableName: string,
    clientId: string
): Promise<ClientItem | null> {
    const result = await withRetry(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.CLIENT}${clientId}`,
                    SK: 'CONFIG',
                },
            })
        );
    });

    if (!isClientItem(result.Item)) {
        return null;
    }

    return result.Item;
}

/**
 * Save or update a client. `createdAt` survives an overwrite only if the
 * caller carries it over.
 */
export async function saveClient(
    client: DynamoDBDocumentClient,
    tableName: string,
    clientItem: ClientItem
): Promise<void> {
    await withRetry(async () => {
        return client.send(
            new PutCommand({
                TableName: tableName,
                Item: clientItem,
            })
        );
    });
}
