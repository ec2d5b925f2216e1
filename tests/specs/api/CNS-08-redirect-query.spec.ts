/**
 * CNS-08: Registered Redirect URI With Query
 *
 * A registered redirect URI may carry its own query. It is kept, and the
 * code or error and state are added to it.
 */

import { describe, it, expect } from 'vitest';
import { hashToken } from '@authcode/shared';
import { decide, startAuthorization } from '../../support/flow';
import { createHarness } from '../../support/fixtures';

const INITECH = {
  clientId: 'initech',
  clientName: 'Initech',
  websiteUrl: 'https://initech.example',
  logoUrl: 'https://initech.example/logo.png',
  redirectUri: 'https://initech.example/oauth/cb?tenant=7',
  clientSecretHash: hashToken('initech-test-secret'),
};

const INITECH_REQUEST = {
  response_type: 'code',
  client_id: 'initech',
  redirect_uri: 'https://initech.example/oauth/cb?tenant=7',
  scope: 'read',
  state: 'st-1',
};

describe('CNS-08: Registered Redirect URI With Query', () => {
  it('should keep the registered query on approval', async () => {
    const harness = createHarness({ clients: [INITECH] });
    const started = await startAuthorization(harness, INITECH_REQUEST);
    const code = [...harness.store.pending.values()][0].code;

    const response = await decide(harness, started, 'true', INITECH_REQUEST);

    expect(response.headers['location']).toBe(
      `https://initech.example/oauth/cb?tenant=7&code=${code}&state=st-1`
    );
  });

  it('should keep the registered query on denial', async () => {
    const harness = createHarness({ clients: [INITECH] });
    const started = await startAuthorization(harness, INITECH_REQUEST);

    const response = await decide(harness, started, 'false', INITECH_REQUEST);

    expect(response.headers['location']).toBe(
      'https://initech.example/oauth/cb?tenant=7&error=access_denied&state=st-1'
    );
  });
});
