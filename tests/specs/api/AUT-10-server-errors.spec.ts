/**
 * AUT-10: Server Errors
 *
 * Configuration and storage failures are the server's fault: HTTP 500
 * with server_error, and nothing about the cause in the body.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { handler, confirmHandler, createAuthorizeHandler } from '@authcode/oauth2-authorize';
import { assertOAuth2Error, invoke } from '../../support/api';
import { authorizeEvent, confirmEvent } from '../../support/events';
import { ACME_REQUEST, AUTHORIZE_CONFIG, createHarness } from '../../support/fixtures';

describe('AUT-10: Server Errors', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should return server_error when TABLE_NAME is not configured', async () => {
    vi.stubEnv('TABLE_NAME', '');

    const response = await invoke(handler, authorizeEvent(ACME_REQUEST));

    assertOAuth2Error(response, 'server_error', { expectedStatus: 500 });
  });

  it('should return server_error from /confirm_auth when TABLE_NAME is not configured', async () => {
    vi.stubEnv('TABLE_NAME', '');

    const response = await invoke(
      confirmHandler,
      confirmEvent({ authorize: 'true', client_id: 'acme', state: 'xyz' }, ['__Host-pending_auth=abc'])
    );

    assertOAuth2Error(response, 'server_error', { expectedStatus: 500 });
  });

  it('should return server_error when a TTL setting is malformed', async () => {
    vi.stubEnv('TABLE_NAME', 'test-table');
    vi.stubEnv('PENDING_AUTH_TTL_SECONDS', 'soon');

    const response = await invoke(handler, authorizeEvent(ACME_REQUEST));

    assertOAuth2Error(response, 'server_error', { expectedStatus: 500 });
  });

  it('should return server_error when the registry is unavailable', async () => {
    const { store } = createHarness();
    const authorize = createAuthorizeHandler(() => ({
      registry: { lookup: () => Promise.reject(new Error('ProvisionedThroughputExceededException')) },
      store,
      config: AUTHORIZE_CONFIG,
      now: () => 0,
    }));

    const response = await invoke(authorize, authorizeEvent(ACME_REQUEST));

    assertOAuth2Error(response, 'server_error', { expectedStatus: 500 });
    expect(response.body).not.toContain('Provisioned');
  });

  it('should return server_error when the pending authorization cannot be stored', async () => {
    const harness = createHarness();
    vi.spyOn(harness.store, 'createPending').mockRejectedValue(new Error('ConditionalCheckFailedException'));

    const response = await invoke(harness.authorize, authorizeEvent(ACME_REQUEST));

    assertOAuth2Error(response, 'server_error', { expectedStatus: 500 });
    expect(response.headers['set-cookie']).toBeUndefined();
  });
});
