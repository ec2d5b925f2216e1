/**
 * Authorization Endpoint - Lambda Handlers
 *
 * GET /auth (handler):
 * 1. Reject duplicate parameters
 * 2. Validate the request and resolve the client
 * 3. Issue a pending authorization bound to a session cookie
 * 4. Render the consent page
 *
 * GET /confirm_auth (confirmHandler): see ./consent
 *
 * Security:
 * - Errors are JSON 400 responses; nothing redirects to an unverified URI
 * - Strict redirect_uri validation (exact match)
 * - The pending authorization expires server-side, whatever the cookie says
 *
 * @module oauth2_authorize
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.1
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import {
    AuthorizationErrors,
    buildSessionCookieHeader,
    createDynamoPorts,
    createLogger,
    describeError,
    epochNow,
    epochToIso,
    htmlPage,
    isValidClientId,
    oauthError,
    serverError,
    withContext,
} from '@authcode/shared';
import { getEnvConfig } from './config';
import { createConfirmHandler } from './consent';
import { renderConsentPage } from './consent-page';
import { issuePendingAuthorization } from './issuer';
import {
    findDuplicateParams,
    parseQueryParams,
    validateAuthorizationRequest,
} from './validator';
import type { AuthorizeDependencies, HttpHandler } from './types';

// =============================================================================
// Default Wiring
// =============================================================================

/**
 * DynamoDB-backed dependencies from the environment.
 *
 * @throws Error when the environment is misconfigured
 */
export function resolveDefaultDependencies(): AuthorizeDependencies {
    const config = getEnvConfig();
    const { registry, store } = createDynamoPorts(
        { tableName: config.tableName, region: config.region },
        { authCodeTtlSeconds: config.authCodeTtlSeconds }
    );
    return { registry, store, config, now: epochNow };
}

// =============================================================================
// GET /auth
// =============================================================================

/**
 * Build the /auth handler around a dependency resolver.
 */
export function createAuthorizeHandler(resolveDeps: () => AuthorizeDependencies): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context): Promise<APIGatewayProxyResultV2> => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            const { registry, store, config, now } = resolveDeps();
            const params = parseQueryParams(event);
            // Only a well-formed client_id is worth recording
            const auditClientId =
                params.clientId && isValidClientId(params.clientId) ? params.clientId : undefined;

            const duplicates = findDuplicateParams(event.rawQueryString);
            if (duplicates.length > 0) {
                logger.warn('Duplicate authorization parameters', { parameters: duplicates });
                audit.authRequestRejected({
                    clientId: auditClientId,
                    error: AuthorizationErrors.INVALID_REQUEST,
                    reason: 'DUPLICATE_PARAMETER',
                });
                return oauthError(AuthorizationErrors.INVALID_REQUEST);
            }

            const validation = await validateAuthorizationRequest(params, registry, {
                loopbackClientIds: config.loopbackClientIds,
            });
            if (!validation.valid) {
                audit.authRequestRejected({
                    clientId: auditClientId,
                    error: validation.error,
                    reason: validation.reason,
                });
                return oauthError(validation.error);
            }

            const { request } = validation;
            const { sessionToken, pending } = await issuePendingAuthorization(
                request,
                store,
                now(),
                config.pendingTtlSeconds
            );

            audit.pendingAuthorizationCreated({
                clientId: request.clientId,
                scopes: request.scopes,
                expiresAt: epochToIso(pending.expiresAt),
            });

            const html = renderConsentPage({
                client: request.client,
                scopes: request.scopes,
                state: request.state,
                csrfToken: pending.csrfToken,
            });

            return htmlPage(
                html,
                buildSessionCookieHeader(config.pendingCookieName, sessionToken, config.pendingTtlSeconds)
            );
        } catch (err) {
            logger.error('Authorization handler error', describeError(err));
            return serverError();
        }
    };
}

// =============================================================================
// Lambda Entry Points
// =============================================================================

export const handler = createAuthorizeHandler(resolveDefaultDependencies);

export const confirmHandler = createConfirmHandler(resolveDefaultDependencies);

export { createConfirmHandler, parseDecision } from './consent';
export { renderConsentPage, CONFIRM_PATH } from './consent-page';
export { issuePendingAuthorization } from './issuer';
export { findDuplicateParams, parseQueryParams, validateAuthorizationRequest } from './validator';
export { getEnvConfig } from './config';
export type * from './types';
