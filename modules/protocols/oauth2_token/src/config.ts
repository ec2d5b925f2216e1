/**
 * Token Endpoint - Environment Configuration
 *
 * @module oauth2_token/config
 */

import {
    DefaultLifetimes,
    MIN_SIGNING_SECRET_LENGTH,
    readPositiveInt,
    requireEnv,
} from '@authcode/shared';
import type { Env } from '@authcode/shared';
import type { TokenEnvConfig } from './types';

/**
 * Load and validate the token endpoint configuration.
 *
 * @throws Error if a required variable is missing or a value is invalid
 */
export function getEnvConfig(env: Env = process.env): TokenEnvConfig {
    const signingSecret = requireEnv(env, 'TOKEN_SIGNING_SECRET');
    if (signingSecret.length < MIN_SIGNING_SECRET_LENGTH) {
        throw new Error(`TOKEN_SIGNING_SECRET must be at least ${MIN_SIGNING_SECRET_LENGTH} characters`);
    }

    return {
        tableName: requireEnv(env, 'TABLE_NAME'),
        region: env.AWS_REGION || undefined,
        issuer: requireEnv(env, 'ISSUER'),
        signingSecret,
        signingKeyId: env.SIGNING_KEY_ID || undefined,
        accessTokenTtl: readPositiveInt(env, 'ACCESS_TOKEN_TTL', DefaultLifetimes.ACCESS_TOKEN),
        authCodeTtlSeconds: readPositiveInt(env, 'AUTH_CODE_TTL_SECONDS', DefaultLifetimes.AUTHORIZATION_CODE),
    };
}
