/**
 * Authorization Code Service - Storage Adapter Types
 *
 * @module storage/types
 */

// =============================================================================
// Storage Adapter Configuration
// =============================================================================

/**
 * Configuration options for the DynamoDB adapters.
 */
export interface StorageAdapterConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    /** AWS region (optional, defaults to environment) */
    region?: string;
}

/**
 * Configuration for the Authorization Code Store.
 */
export interface CodeStoreConfig {
    /** Lifetime of a redeemable code, from approval */
    authCodeTtlSeconds: number;
}

// =============================================================================
// Time Conversion
// =============================================================================

/** Epoch seconds to ISO 8601 */
export function epochToIso(epochSeconds: number): string {
    return new Date(epochSeconds * 1000).toISOString();
}

/** ISO 8601 to epoch seconds */
export function isoToEpoch(iso: string): number {
    return Math.floor(Date.parse(iso) / 1000);
}

/** Current time in epoch seconds */
export function epochNow(): number {
    return Math.floor(Date.now() / 1000);
}
