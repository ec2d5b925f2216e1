/**
 * Authorization Endpoint - Environment Configuration
 *
 * @module oauth2_authorize/config
 */

import {
    DEFAULT_PENDING_COOKIE_NAME,
    DefaultLifetimes,
    readList,
    readPositiveInt,
    requireEnv,
} from '@authcode/shared';
import type { Env } from '@authcode/shared';
import type { AuthorizeEnvConfig } from './types';

/**
 * Read the authorize and confirm handler configuration.
 *
 * @throws Error when TABLE_NAME is missing or a TTL is not a positive integer
 */
export function getEnvConfig(env: Env = process.env): AuthorizeEnvConfig {
    return {
        tableName: requireEnv(env, 'TABLE_NAME'),
        region: env.AWS_REGION || undefined,
        pendingTtlSeconds: readPositiveInt(env, 'PENDING_AUTH_TTL_SECONDS', DefaultLifetimes.PENDING_AUTHORIZATION),
        authCodeTtlSeconds: readPositiveInt(env, 'AUTH_CODE_TTL_SECONDS', DefaultLifetimes.AUTHORIZATION_CODE),
        pendingCookieName: env.PENDING_COOKIE_NAME || DEFAULT_PENDING_COOKIE_NAME,
        loopbackClientIds: readList(env, 'LOOPBACK_CLIENT_IDS'),
    };
}
