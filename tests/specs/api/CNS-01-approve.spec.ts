/**
 * CNS-01: Approve
 *
 * Approval turns the pending code into a redeemable one and sends the
 * browser to the registered redirect URI with the code and the original
 * state. The session cookie is cleared.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { assertOAuth2Error, parseRedirectLocation } from '../../support/api';
import type { HttpResponse } from '../../support/api';
import { decide, startAuthorization } from '../../support/flow';
import type { StartedAuthorization } from '../../support/flow';
import { START_TIME, createHarness } from '../../support/fixtures';
import type { Harness } from '../../support/fixtures';

describe('CNS-01: Approve', () => {
  let harness: Harness;
  let started: StartedAuthorization;
  let pendingCode: string;
  let response: HttpResponse;

  beforeEach(async () => {
    harness = createHarness();
    started = await startAuthorization(harness);
    pendingCode = [...harness.store.pending.values()][0].code;
    harness.clock.advance(30);
    response = await decide(harness, started, 'true');
  });

  it('should redirect to the registered URI with code and state', () => {
    const location = parseRedirectLocation(response);

    expect(response.headers['location']).toBe(`https://acme.example/cb?code=${pendingCode}&state=xyz`);
    expect(location.origin + location.pathname).toBe('https://acme.example/cb');
    expect(location.searchParams.get('code')).toBe(pendingCode);
    expect(location.searchParams.get('state')).toBe('xyz');
  });

  it('should clear the session cookie', () => {
    expect(response.headers['set-cookie']).toBe(
      '__Host-pending_auth=; Max-Age=0; Path=/; HttpOnly; Secure; SameSite=Strict'
    );
  });

  it('should consume the pending authorization', () => {
    expect(harness.store.pending.size).toBe(0);
  });

  it('should store a redeemable code bound to the client and redirect URI', () => {
    expect(harness.store.codes.get(`CODE#${pendingCode}`)).toMatchObject({
      entityType: 'AUTH_CODE',
      clientId: 'acme',
      scope: 'read write',
      redirectUri: 'https://acme.example/cb',
      used: false,
      issuedAt: '2030-01-01T00:00:30.000Z',
      ttl: START_TIME + 30 + 600,
    });
  });

  it('should not cache the redirect', () => {
    expect(response.headers['cache-control']).toBe('no-store');
  });

  it('should return invalid_request when the same session confirms again', async () => {
    const again = await decide(harness, started, 'true');

    assertOAuth2Error(again, 'invalid_request');
  });

  it('should not carry any other parameter to the client', () => {
    const location = parseRedirectLocation(response);

    expect([...location.searchParams.keys()]).toEqual(['code', 'state']);
  });
});
