/**
 * Authorization Code Service - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * Design Principles:
 * - All audit events are JSON-formatted for CloudWatch Logs Insights queries
 * - Every protocol transition produces an audit entry
 * - Request context (requestId, IP) is captured for traceability
 * - Codes, session tokens, secrets and access tokens never appear in a log line
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditActor,
    AuditLogEntry,
    AuditLogger as IAuditLogger,
    AuthCodeIssuedDetails,
    AuthCodeRejectedDetails,
    AuthRequestRejectedDetails,
    ClientAuthenticatedDetails,
    ClientAuthFailedDetails,
    ClientRegisteredDetails,
    ConsentDecisionDetails,
    DistributiveOmit,
    PendingAuthorizationCreatedDetails,
    StrictAuditLogEntry,
    TokenIssuedDetails,
} from '../../shared_types/audit';
import { ErrorMessages } from './errors/error-messages';
import type { ErrorMessageKey } from './errors/error-messages';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string */
    userAgent?: string;
}

/** Rejection as reported by a handler, before its description is added */
export type AuthRequestRejection = Omit<AuthRequestRejectedDetails, 'reason' | 'description'> & {
    reason: ErrorMessageKey;
};

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * AuditLogger writes one JSON line per event to stdout, which Lambda
 * routes to CloudWatch.
 */
export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void {
        const logEntry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    logStrict(entry: DistributiveOmit<StrictAuditLogEntry, 'level' | 'timestamp'>): void {
        const logEntry = {
            level: 'AUDIT' as const,
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    child(context: { requestId: string; ip: string }): AuditLogger {
        return new AuditLogger({
            requestId: context.requestId,
            ip: context.ip,
            userAgent: this.context.userAgent,
        });
    }

    // ---------------------------------------------------------------------------
    // Authorization Endpoint
    // ---------------------------------------------------------------------------

    /** The description is looked up from the reason */
    authRequestRejected(details: AuthRequestRejection): void {
        this.logStrict({
            action: 'AUTH_REQUEST_REJECTED',
            actor: details.clientId ? { type: 'CLIENT', clientId: details.clientId } : { type: 'ANONYMOUS' },
            details: { ...details, description: ErrorMessages[details.reason] },
        });
    }

    pendingAuthorizationCreated(details: PendingAuthorizationCreatedDetails): void {
        this.logStrict({
            action: 'PENDING_AUTHORIZATION_CREATED',
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    /**
     * The resource owner's decision. The browser is the actor; it has no
     * identity of its own here.
     */
    consentDecided(approved: boolean, details: ConsentDecisionDetails): void {
        this.logStrict({
            action: approved ? 'CONSENT_APPROVED' : 'CONSENT_DENIED',
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    authCodeIssued(details: AuthCodeIssuedDetails): void {
        this.logStrict({
            action: 'AUTH_CODE_ISSUED',
            actor: { type: 'SYSTEM', process: 'consent' },
            details,
        });
    }

    // ---------------------------------------------------------------------------
    // Token Endpoint
    // ---------------------------------------------------------------------------

    clientAuthenticated(details: ClientAuthenticatedDetails): void {
        this.logStrict({
            action: 'CLIENT_AUTHENTICATED',
            actor: { type: 'CLIENT', clientId: details.clientId },
            details,
        });
    }

    clientAuthFailed(details: ClientAuthFailedDetails): void {
        this.logStrict({
            action: 'CLIENT_AUTH_FAILED',
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    authCodeExchanged(clientId: string): void {
        this.logStrict({
            action: 'AUTH_CODE_EXCHANGED',
            actor: { type: 'CLIENT', clientId },
            details: { clientId, grantType: 'authorization_code' },
        });
    }

    authCodeRejected(details: AuthCodeRejectedDetails): void {
        this.logStrict({
            action: 'AUTH_CODE_REJECTED',
            actor: { type: 'CLIENT', clientId: details.clientId },
            details,
        });
    }

    tokenIssued(details: TokenIssuedDetails): void {
        this.logStrict({
            action: 'TOKEN_ISSUED',
            actor: { type: 'CLIENT', clientId: details.clientId },
            details,
        });
    }

    // ---------------------------------------------------------------------------
    // Client Registry
    // ---------------------------------------------------------------------------

    clientRegistered(details: ClientRegisteredDetails): void {
        this.logStrict({
            action: 'CLIENT_REGISTERED',
            actor: { type: 'SYSTEM', process: 'seed-client' },
            details,
        });
    }

    /**
     * Log a generic audit event.
     */
    audit(action: AuditLogEntry['action'], actor: AuditActor, details: Record<string, unknown>): void {
        this.log({ action, actor, details });
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.clientAuthFailed({ clientId: 'acme', reason: 'invalid_secret' });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    // HTTP API v2 lowercases header names
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const ip = forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';

    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    const userAgent = event.headers?.['user-agent'];

    return new AuditLogger({
        requestId,
        ip,
        userAgent,
    });
}

/**
 * Create an AuditLogger for scripts and other processes outside a request.
 */
export function createSystemLogger(processName: string): AuditLogger {
    return new AuditLogger({
        requestId: `system-${Date.now()}`,
        ip: 'internal',
        userAgent: processName,
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

/** Log levels for structured logging */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId);
}

/**
 * Message and stack of a caught value, for the `data` of an ERROR line.
 */
export function describeError(err: unknown): { error: string; stack?: string } {
    if (err instanceof Error) {
        return { error: err.message, stack: err.stack };
    }
    return { error: String(err) };
}
