/**
 * Authorization Code Service - Client Entity Types
 *
 * Registered relying party stored in DynamoDB.
 *
 * Key Pattern:
 *   PK: CLIENT#<client_id>
 *   SK: CONFIG
 *
 * The client_id is the immutable lookup key. The display name is a separate,
 * mutable attribute and is never used to find a client.
 *
 * @see RFC 6749 Section 2 - Client Registration
 * @see RFC 6749 Section 3.1.2.2 - Registration Requirements
 */

import type { BaseItem } from './base';

// =============================================================================
// Client Entity
// =============================================================================

export interface ClientItem extends BaseItem {
    /** PK pattern: CLIENT#<client_id> */
    PK: `CLIENT#${string}`;
    SK: 'CONFIG';
    entityType: 'CLIENT';

    /** OAuth client identifier (opaque, registry-assigned) */
    clientId: string;

    /** Display name shown on the consent page */
    clientName: string;

    /** Client home page shown on the consent page */
    websiteUrl: string;

    /** Logo shown on the consent page */
    logoUrl: string;

    /** The single registered redirect URI (exact match required) */
    redirectUri: string;

    /** SHA-256 hex digest of the shared client secret */
    clientSecretHash: string;
}
