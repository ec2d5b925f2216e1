/**
 * AUT-05: Redirect URI Format
 *
 * redirect_uri must be an absolute https URI without a fragment. Plaintext
 * http is accepted only on a loopback host, and only for clients listed in
 * LOOPBACK_CLIENT_IDS.
 */

import { describe, it, expect } from 'vitest';
import { assertOAuth2Error, invoke } from '../../support/api';
import { authorizeEvent } from '../../support/events';
import { ACME_REQUEST, createHarness, LOCAL_DEV } from '../../support/fixtures';

const LOCAL_DEV_REQUEST = {
  ...ACME_REQUEST,
  client_id: LOCAL_DEV.clientId,
  redirect_uri: LOCAL_DEV.redirectUri,
};

describe('AUT-05: Redirect URI Format', () => {
  it.each([
    ['plaintext http', 'http://acme.example/cb'],
    ['a relative reference', '/cb'],
    ['a fragment', 'https://acme.example/cb#frag'],
    ['an empty fragment', 'https://acme.example/cb#'],
    ['a custom scheme', 'acme://callback'],
    ['a javascript URI', 'javascript:alert(1)'],
    ['not a URI at all', 'not a uri'],
  ])('should return invalid_request for %s', async (_label, redirectUri) => {
    const harness = createHarness();

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...ACME_REQUEST, redirect_uri: redirectUri })
    );

    assertOAuth2Error(response, 'invalid_request');
  });

  it('should reject a redirect_uri longer than 2048 characters', async () => {
    const harness = createHarness();
    const longUri = `https://acme.example/${'a'.repeat(2048)}`;

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...ACME_REQUEST, redirect_uri: longUri })
    );

    assertOAuth2Error(response, 'invalid_request');
  });

  it('should accept http on localhost for a loopback client', async () => {
    const harness = createHarness();

    const response = await invoke(harness.authorize, authorizeEvent(LOCAL_DEV_REQUEST));

    expect(response.status).toBe(200);
  });

  it('should reject http on localhost for a client not listed as loopback', async () => {
    const harness = createHarness();
    harness.registry.update('acme', { redirectUri: 'http://localhost:8080/callback' });

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...ACME_REQUEST, redirect_uri: 'http://localhost:8080/callback' })
    );

    assertOAuth2Error(response, 'invalid_request');
  });

  it('should reject http on a non-loopback host even for a loopback client', async () => {
    const harness = createHarness();
    harness.registry.update('local-dev', { redirectUri: 'http://dev.example/callback' });

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...LOCAL_DEV_REQUEST, redirect_uri: 'http://dev.example/callback' })
    );

    assertOAuth2Error(response, 'invalid_request');
  });
});
