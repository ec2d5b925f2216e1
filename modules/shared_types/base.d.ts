/**
 * Authorization Code Service - Base DynamoDB Schema Types
 *
 * Foundation interfaces for Single Table Design.
 * All entity types extend BaseItem for consistent key structure.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., CLIENT#<id>)
 * - SK (Sort Key): Entity type identifier (CONFIG, METADATA)
 *
 * TTL Strategy:
 * - Short-lived entities (pending authorizations, codes): TTL set to expiration time
 * - Long-lived entities (clients): No TTL (managed by the seeding/admin process)
 *
 * DynamoDB deletes expired items lazily, so every read still compares `ttl`
 * against the current time.
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 * @see https://docs.aws.amazon.com/amazondynamodb/latest/developerguide/TTL.html
 */

// =============================================================================
// Key Pattern Prefixes (Strict Typing)
// =============================================================================

/** Partition Key prefixes for each entity type */
export type PKPrefix =
    | `CLIENT#${string}`
    | `PENDING#${string}`
    | `CODE#${string}`;

/** Sort Key values */
export type SKValue = 'CONFIG' | 'METADATA';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'CLIENT'
    | 'PENDING_AUTHORIZATION'
    | 'AUTH_CODE';

// =============================================================================
// Grant Types
// =============================================================================

/** The only grant this service understands */
export type GrantType = 'authorization_code';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** TTL for automatic expiration (Unix epoch seconds). Optional for long-lived entities. */
    ttl?: number;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
