/**
 * Test Fixtures
 *
 * One registered client, fixed clock, and handler wiring over the
 * in-memory ports.
 */

import { hashToken } from '@authcode/shared';
import {
  createAuthorizeHandler,
  createConfirmHandler,
} from '@authcode/oauth2-authorize';
import type { AuthorizeEnvConfig } from '@authcode/oauth2-authorize';
import { createTokenHandler } from '@authcode/oauth2-token';
import type { TokenEnvConfig } from '@authcode/oauth2-token';
import type { RegisteredClient } from '@authcode/shared';
import { InMemoryAuthorizationCodeStore, InMemoryClientRegistry } from './memory-stores';

// =============================================================================
// Clients
// =============================================================================

export const ACME_SECRET = 'test-secret';

export const ACME: RegisteredClient = {
  clientId: 'acme',
  clientName: 'Acme Reader',
  websiteUrl: 'https://acme.example',
  logoUrl: 'https://acme.example/logo.png',
  redirectUri: 'https://acme.example/cb',
  clientSecretHash: hashToken(ACME_SECRET),
};

export const GLOBEX_SECRET = 'other-test-secret';

export const GLOBEX: RegisteredClient = {
  clientId: 'globex',
  clientName: 'Globex',
  websiteUrl: 'https://globex.example',
  logoUrl: 'https://globex.example/logo.png',
  redirectUri: 'https://globex.example/callback',
  clientSecretHash: hashToken(GLOBEX_SECRET),
};

export const LOCAL_DEV: RegisteredClient = {
  clientId: 'local-dev',
  clientName: 'Local Development Client',
  websiteUrl: 'https://example.com',
  logoUrl: 'https://example.com/logo.png',
  redirectUri: 'http://localhost:8080/callback',
  clientSecretHash: hashToken('local-test-secret'),
};

/** The authorization request from the happy-path scenario */
export const ACME_REQUEST = {
  response_type: 'code',
  client_id: 'acme',
  redirect_uri: 'https://acme.example/cb',
  scope: 'read write',
  state: 'xyz',
};

// =============================================================================
// Configuration
// =============================================================================

/** 2030-01-01T00:00:00Z */
export const START_TIME = 1893456000;

export const TEST_ISSUER = 'https://auth.test.example';

export const TEST_SIGNING_SECRET = 'test-signing-secret-0123456789abcdef';

export const AUTHORIZE_CONFIG: AuthorizeEnvConfig = {
  tableName: 'test-table',
  pendingTtlSeconds: 3600,
  authCodeTtlSeconds: 600,
  pendingCookieName: '__Host-pending_auth',
  loopbackClientIds: ['local-dev'],
};

export const TOKEN_CONFIG: TokenEnvConfig = {
  tableName: 'test-table',
  issuer: TEST_ISSUER,
  signingSecret: TEST_SIGNING_SECRET,
  accessTokenTtl: 3600,
  authCodeTtlSeconds: 600,
};

// =============================================================================
// Harness
// =============================================================================

export interface TestClock {
  now(): number;
  advance(seconds: number): void;
}

export function createClock(start = START_TIME): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (seconds: number) => {
      current += seconds;
    },
  };
}

/**
 * All three handlers sharing one registry, one store and one clock.
 */
export function createHarness(options: {
  clients?: RegisteredClient[];
  tokenConfig?: Partial<TokenEnvConfig>;
} = {}) {
  const registry = new InMemoryClientRegistry(options.clients ?? [ACME, GLOBEX, LOCAL_DEV]);
  const store = new InMemoryAuthorizationCodeStore(AUTHORIZE_CONFIG.authCodeTtlSeconds);
  const clock = createClock();
  const tokenConfig: TokenEnvConfig = { ...TOKEN_CONFIG, ...options.tokenConfig };

  const authorizeDeps = () => ({ registry, store, config: AUTHORIZE_CONFIG, now: clock.now });
  const tokenDeps = () => ({ registry, store, config: tokenConfig, now: clock.now });

  return {
    registry,
    store,
    clock,
    tokenConfig,
    authorize: createAuthorizeHandler(authorizeDeps),
    confirm: createConfirmHandler(authorizeDeps),
    token: createTokenHandler(tokenDeps),
  };
}

export type Harness = ReturnType<typeof createHarness>;
