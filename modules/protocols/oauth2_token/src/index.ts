/**
 * Token Endpoint - Lambda Handler
 *
 * Implements POST /token for the authorization_code grant
 * (RFC 6749 Section 4.1.3).
 *
 * Request Format:
 * - Method: POST
 * - Content-Type: application/x-www-form-urlencoded or application/json
 * - Authentication: HTTP Basic or client_id/client_secret in the body
 *
 * Responses:
 * - 200 { access_token, token_type, expires_in, scope } with Cache-Control: no-store
 * - 400 { error } for every client error, 500 { error: "server_error" } otherwise
 *
 * @module oauth2_token
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-5
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import {
    ErrorMessages,
    TokenErrors,
    createDynamoPorts,
    createLogger,
    describeError,
    epochNow,
    oauthError,
    serverError,
    success,
    withContext,
} from '@authcode/shared';
import { getEnvConfig } from './config';
import { exchangeAuthorizationCode } from './grants/authorization-code';
import { parseTokenRequest } from './request';
import type { HttpHandler, TokenDependencies } from './types';

// =============================================================================
// Default Wiring
// =============================================================================

/**
 * DynamoDB-backed dependencies from the environment.
 *
 * @throws Error when the environment is misconfigured
 */
export function resolveDefaultDependencies(): TokenDependencies {
    const config = getEnvConfig();
    const { registry, store } = createDynamoPorts(
        { tableName: config.tableName, region: config.region },
        { authCodeTtlSeconds: config.authCodeTtlSeconds }
    );
    return { registry, store, config, now: epochNow };
}

// =============================================================================
// Lambda Handler
// =============================================================================

/**
 * Build the /token handler around a dependency resolver.
 */
export function createTokenHandler(resolveDeps: () => TokenDependencies): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context): Promise<APIGatewayProxyResultV2> => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            const deps = resolveDeps();

            const parsed = parseTokenRequest(event);
            if (!parsed.ok) {
                logger.warn('Rejected token request body', {
                    reason: parsed.reason,
                    description: ErrorMessages[parsed.reason],
                    ...(parsed.duplicates && { parameters: parsed.duplicates }),
                });
                return oauthError(TokenErrors.INVALID_REQUEST);
            }

            // v2 headers are lowercase
            const authHeader = event.headers?.['authorization'];
            const result = await exchangeAuthorizationCode(parsed.params, authHeader, deps, audit);

            if (!result.ok) {
                logger.warn('Token request rejected', {
                    error: result.error,
                    reason: result.reason,
                    description: ErrorMessages[result.reason],
                });
                return oauthError(result.error);
            }

            return success(result.response);
        } catch (err) {
            logger.error('Token endpoint error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createTokenHandler(resolveDefaultDependencies);

export { exchangeAuthorizationCode } from './grants/authorization-code';
export type { GrantResult } from './grants/authorization-code';
export { signAccessToken, verifyAccessToken } from './signer';
export type { AccessTokenClaims, SignedAccessToken, SignerConfig, VerifyOptions } from './signer';
export { parseTokenRequest, findDuplicateFormParams, getRawBody } from './request';
export { getEnvConfig } from './config';
export type * from './types';
