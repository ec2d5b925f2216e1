/**
 * Authorization Code Service - Audit Schema
 *
 * Structured audit logging interfaces.
 * All audit events are JSON-formatted for CloudWatch.
 *
 * This file defines the contract for the AuditLogger utility class.
 *
 * Rules:
 * - Every event carries timestamp, actor, action and source IP
 * - Client secrets, codes, session tokens and access tokens are never logged
 */

// =============================================================================
// Audit Actions
// =============================================================================

export type AuditAction =
    | 'AUTH_REQUEST_REJECTED'
    | 'PENDING_AUTHORIZATION_CREATED'
    | 'CONSENT_APPROVED'
    | 'CONSENT_DENIED'
    | 'AUTH_CODE_ISSUED'
    | 'AUTH_CODE_EXCHANGED'
    | 'AUTH_CODE_REJECTED'
    | 'TOKEN_ISSUED'
    | 'CLIENT_AUTHENTICATED'
    | 'CLIENT_AUTH_FAILED'
    | 'CLIENT_REGISTERED';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * Entity performing the audited action. The resource owner is anonymous to
 * this service; it only sees the browser session.
 */
export type AuditActor =
    | { type: 'CLIENT'; clientId: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * Structured audit log entry for CloudWatch.
 *
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2024-01-15T10:30:00.000Z',
 *   requestId: 'abc123-def456-ghi789',
 *   action: 'TOKEN_ISSUED',
 *   ip: '192.168.1.1',
 *   actor: { type: 'CLIENT', clientId: 'acme' },
 *   details: { clientId: 'acme', scopes: ['read'], expiresIn: 3600, grantType: 'authorization_code' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', so audit lines can be filtered from other levels. */
    level: 'AUDIT';

    /** ISO 8601 UTC timestamp */
    timestamp: string;

    /** AWS Request ID. Filled from context when omitted. */
    requestId?: string;

    action: AuditAction;

    /** Source IP. Filled from context when omitted. */
    ip?: string;

    actor: AuditActor;

    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

export interface AuthRequestRejectedDetails {
    /** Client named by the request, if any */
    clientId?: string;
    /** Wire error code returned */
    error: string;
    /** Internal reason, never sent to the caller */
    reason: string;
    /** Human-readable text for `reason` */
    description: string;
}

export interface PendingAuthorizationCreatedDetails {
    clientId: string;
    scopes: string[];
    /** Expiry (ISO 8601) */
    expiresAt: string;
}

export interface ConsentDecisionDetails {
    clientId: string;
    scopes: string[];
}

export interface AuthCodeIssuedDetails {
    clientId: string;
    scopes: string[];
    /** Code expiration time (ISO 8601) */
    expiresAt: string;
}

export interface AuthCodeExchangedDetails {
    clientId: string;
    grantType: 'authorization_code';
}

export interface AuthCodeRejectedDetails {
    clientId: string;
    reason: 'not_found' | 'client_mismatch' | 'redirect_mismatch' | 'expired' | 'already_used';
}

export interface TokenIssuedDetails {
    clientId: string;
    scopes: string[];
    /** Lifetime in seconds, as reported in expires_in */
    expiresIn: number;
    grantType: 'authorization_code';
}

export interface ClientAuthenticatedDetails {
    clientId: string;
    method: 'client_secret_basic' | 'client_secret_post';
}

export interface ClientAuthFailedDetails {
    /** Client ID that failed authentication (if provided) */
    clientId?: string;
    reason: 'unknown_client' | 'invalid_secret';
}

export interface ClientRegisteredDetails {
    clientId: string;
    redirectUri: string;
}

// =============================================================================
// Strictly-Typed Audit Entry Variants
// =============================================================================

type Entry<A extends AuditAction, D> = Omit<AuditLogEntry, 'action' | 'details'> & {
    action: A;
    details: D;
};

export type StrictAuditLogEntry =
    | Entry<'AUTH_REQUEST_REJECTED', AuthRequestRejectedDetails>
    | Entry<'PENDING_AUTHORIZATION_CREATED', PendingAuthorizationCreatedDetails>
    | Entry<'CONSENT_APPROVED', ConsentDecisionDetails>
    | Entry<'CONSENT_DENIED', ConsentDecisionDetails>
    | Entry<'AUTH_CODE_ISSUED', AuthCodeIssuedDetails>
    | Entry<'AUTH_CODE_EXCHANGED', AuthCodeExchangedDetails>
    | Entry<'AUTH_CODE_REJECTED', AuthCodeRejectedDetails>
    | Entry<'TOKEN_ISSUED', TokenIssuedDetails>
    | Entry<'CLIENT_AUTHENTICATED', ClientAuthenticatedDetails>
    | Entry<'CLIENT_AUTH_FAILED', ClientAuthFailedDetails>
    | Entry<'CLIENT_REGISTERED', ClientRegisteredDetails>;

/** Omit that keeps each union member's own action/details pairing */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

// =============================================================================
// Audit Logger Interface (Contract for Implementation)
// =============================================================================

export interface AuditLogger {
    /** Log an audit event with flexible details. */
    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void;

    /** Log a strictly-typed audit event. */
    logStrict(entry: DistributiveOmit<StrictAuditLogEntry, 'level' | 'timestamp'>): void;

    /** Create a child logger with preset context (requestId, ip). */
    child(context: { requestId: string; ip: string }): AuditLogger;
}
