/**
 * Authorization Code Service - DynamoDB Schema Types
 *
 * Single Table Design interfaces for all entities.
 * All items share the same table with PK/SK key patterns.
 *
 * Key Patterns:
 *   - Client:                PK=CLIENT#<id>                  SK=CONFIG
 *   - PendingAuthorization:  PK=PENDING#<sha256(token)>      SK=METADATA
 *   - AuthCode:              PK=CODE#<code>                  SK=METADATA
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Base Types
// =============================================================================

export type {
    PKPrefix,
    SKValue,
    EntityType,
    GrantType,
    BaseItem,
} from './base';

// =============================================================================
// Entity Types
// =============================================================================

export type { ClientItem } from './client';

export type { PendingAuthorizationItem } from './pending';

export type { AuthCodeItem } from './token';
