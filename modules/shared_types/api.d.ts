/**
 * Authorization Code Service - Internal API Contracts
 *
 * Interfaces for communication between modules.
 * These define the PORTS in our Hexagonal Architecture.
 *
 * Design Principles:
 * - Protocol handlers never touch DynamoDB directly; they receive ports
 * - All dependencies point inward (storage adapters depend on ports, not vice versa)
 * - Ports are technology-agnostic interfaces with in-memory test doubles
 *
 * Time is always passed in explicitly as epoch seconds. Expiry is enforced
 * by the store at the point of use.
 *
 * @see https://alistair.cockburn.us/hexagonal-architecture/
 */

// =============================================================================
// Client Registry Port
// =============================================================================

/**
 * Registered client as seen by the protocol core. Read-only.
 */
export interface RegisteredClient {
    /** Immutable lookup key */
    clientId: string;
    /** Mutable display name */
    clientName: string;
    websiteUrl: string;
    logoUrl: string;
    /** Exact-match redirect target */
    redirectUri: string;
    /** SHA-256 hex digest of the shared secret */
    clientSecretHash: string;
}

export interface ClientRegistry {
    /** Returns null when no client is registered under `clientId`. */
    lookup(clientId: string): Promise<RegisteredClient | null>;
}

// =============================================================================
// Authorization Code Store Port
// =============================================================================

/**
 * Session created by the Code Issuer and awaiting the resource owner's decision.
 */
export interface PendingAuthorization {
    /** Code minted at issuance; becomes redeemable only on approval */
    code: string;
    /** Anti-forgery token embedded in the consent form */
    csrfToken: string;
    clientId: string;
    scopes: string[];
    state: string;
    redirectUri: string;
    /** Epoch seconds */
    createdAt: number;
    /** Epoch seconds; dead once `expiresAt <= now` */
    expiresAt: number;
}

/**
 * Code the resource owner approved, bound to one client and one redirect URI.
 */
export interface RedeemableCode {
    code: string;
    clientId: string;
    scopes: string[];
    redirectUri: string;
    /** Epoch seconds */
    issuedAt: number;
    /** Epoch seconds */
    expiresAt: number;
}

export type FinalizeResult =
    | { outcome: 'approved'; code: RedeemableCode }
    | { outcome: 'denied' }
    | { outcome: 'expired_or_absent' };

export type RedeemFailureReason =
    | 'not_found'
    | 'client_mismatch'
    | 'redirect_mismatch'
    | 'expired'
    | 'already_used';

export type RedeemResult =
    | { ok: true; code: RedeemableCode }
    | { ok: false; reason: RedeemFailureReason };

export interface AuthorizationCodeStore {
    /**
     * Persist a pending authorization under the session token.
     * Rejects if a record already exists for the token.
     */
    createPending(sessionToken: string, pending: PendingAuthorization): Promise<void>;

    /** Returns null when the token is unknown or the pending authorization expired. */
    resolvePending(sessionToken: string, now: number): Promise<PendingAuthorization | null>;

    /**
     * Consume the pending authorization. On approval its code becomes
     * redeemable, in the same atomic write that deletes the pending record.
     * A pending authorization can be finalized once.
     */
    finalize(sessionToken: string, approved: boolean, now: number): Promise<FinalizeResult>;

    /**
     * Claim a code for `clientId` and `redirectUri`. Succeeds at most once per code.
     */
    redeem(clientId: string, code: string, redirectUri: string, now: number): Promise<RedeemResult>;
}
