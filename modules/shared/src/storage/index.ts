/**
 * Authorization Code Service - Storage Module
 *
 * Exports all storage operations for the DynamoDB Single Table Design.
 *
 * @module storage
 */

export type { StorageAdapterConfig, CodeStoreConfig } from './types';

export { epochToIso, isoToEpoch, epochNow } from './types';

export {
    withRetry,
    isRetryableError,
    calculateDelay,
    sleep,
    DEFAULT_RETRY_CONFIG,
} from './retry';

export type { RetryConfig } from './retry';

export {
    buildClientItem,
    getClient,
    saveClient,
} from './client-operations';

export type { ClientDefinition } from './client-operations';

export {
    pendingKey,
    buildPendingItem,
    toPendingAuthorization,
    savePendingAuthorization,
    getPendingAuthorization,
    finalizePendingAuthorization,
} from './pending-operations';

export {
    buildAuthCodeItem,
    getAuthCode,
    redeemAuthCode,
} from './auth-code-operations';

export {
    classifyRedemption,
    toRedeemableCode,
} from './redemption';
