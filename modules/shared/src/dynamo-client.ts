/**
 * Authorization Code Service - DynamoDB Port Adapters
 *
 * Implements the Client Registry and Authorization Code Store ports on
 * the Single Table Design. Protocol handlers depend on the ports only;
 * the exported Lambda handlers wire these adapters in.
 *
 * Key Patterns:
 *   - Client:                PK=CLIENT#<id>                  SK=CONFIG
 *   - PendingAuthorization:  PK=PENDING#<sha256(token)>      SK=METADATA
 *   - AuthCode:              PK=CODE#<code>                  SK=METADATA
 *
 * Configuration:
 *   - TABLE_NAME: Injected via environment variable
 *   - Region: Uses AWS SDK default (Lambda execution role region)
 *
 * Design Principles:
 *   - Conditional writes make every state transition happen at most once
 *   - TTL attributes enable automatic cleanup of expired items
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

import type {
    AuthorizationCodeStore,
    ClientRegistry,
    FinalizeResult,
    PendingAuthorization,
    RedeemResult,
    RegisteredClient,
} from '../../shared_types/api';

import type { CodeStoreConfig, StorageAdapterConfig } from './storage/types';
import * as clientOps from './storage/client-operations';
import * as pendingOps from './storage/pending-operations';
import * as authCodeOps from './storage/auth-code-operations';

// =============================================================================
// Document Client
// =============================================================================

let docClient: DynamoDBDocumentClient | null = null;

/**
 * Shared document client, created on first use and reused across warm
 * invocations.
 */
export function getDocClient(region?: string): DynamoDBDocumentClient {
    if (!docClient) {
        docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
            marshallOptions: { removeUndefinedValues: true },
        });
    }
    return docClient;
}

// =============================================================================
// Client Registry
// =============================================================================

export class DynamoClientRegistry implements ClientRegistry {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string
    ) {}

    async lookup(clientId: string): Promise<RegisteredClient | null> {
        const item = await clientOps.getClient(this.client, this.tableName, clientId);
        if (!item) {
            return null;
        }

        return {
            clientId: item.clientId,
            clientName: item.clientName,
            websiteUrl: item.websiteUrl,
            logoUrl: item.logoUrl,
            redirectUri: item.redirectUri,
            clientSecretHash: item.clientSecretHash,
        };
    }
}

// =============================================================================
// Authorization Code Store
// =============================================================================

export class DynamoAuthorizationCodeStore implements AuthorizationCodeStore {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string,
        private readonly config: CodeStoreConfig
    ) {}

    async createPending(sessionToken: string, pending: PendingAuthorization): Promise<void> {
        await pendingOps.savePendingAuthorization(
            this.client,
            this.tableName,
            pendingOps.buildPendingItem(sessionToken, pending)
        );
    }

    async resolvePending(sessionToken: string, now: number): Promise<PendingAuthorization | null> {
        const item = await pendingOps.getPendingAuthorization(this.client, this.tableName, sessionToken, now);
        return item ? pendingOps.toPendingAuthorization(item) : null;
    }

    async finalize(sessionToken: string, approved: boolean, now: number): Promise<FinalizeResult> {
        return pendingOps.finalizePendingAuthorization(
            this.client,
            this.tableName,
            sessionToken,
            approved,
            now,
            this.config.authCodeTtlSeconds
        );
    }

    async redeem(clientId: string, code: string, redirectUri: string, now: number): Promise<RedeemResult> {
        return authCodeOps.redeemAuthCode(this.client, this.tableName, clientId, code, redirectUri, now);
    }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Build both ports on one table.
 *
 * @example
 * ```typescript
 * const { registry, store } = createDynamoPorts({ tableName: config.tableName }, { authCodeTtlSeconds: 600 });
 * ```
 */
export function createDynamoPorts(
    config: StorageAdapterConfig,
    codeStoreConfig: CodeStoreConfig
): { registry: ClientRegistry; store: AuthorizationCodeStore } {
    const client = getDocClient(config.region);
    return {
        registry: new DynamoClientRegistry(client, config.tableName),
        store: new DynamoAuthorizationCodeStore(client, config.tableName, codeStoreConfig),
    };
}
