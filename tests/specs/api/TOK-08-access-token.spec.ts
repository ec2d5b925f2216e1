/**
 * TOK-08: Access Token
 *
 * A successful exchange returns a Bearer JWT signed with the service key.
 * expires_in and exp - iat are the same configured lifetime.
 */

import { describe, it, expect } from 'vitest';
import { decodeProtectedHeader } from 'jose';
import { verifyAccessToken } from '@authcode/oauth2-token';
import { assertTokenResponse } from '../../support/api';
import { exchange, obtainCode } from '../../support/flow';
import {
  START_TIME,
  TEST_ISSUER,
  TEST_SIGNING_SECRET,
  createHarness,
} from '../../support/fixtures';

const VERIFY = { signingSecret: TEST_SIGNING_SECRET, issuer: TEST_ISSUER };

async function issueToken(harness = createHarness()): Promise<string> {
  const code = await obtainCode(harness);
  return assertTokenResponse(await exchange(harness, code)).access_token;
}

describe('TOK-08: Access Token', () => {
  it('should return a Bearer token with the granted scopes and lifetime', async () => {
    const harness = createHarness();
    const code = await obtainCode(harness);

    const body = assertTokenResponse(await exchange(harness, code));

    expect(body.token_type).toBe('Bearer');
    expect(body.expires_in).toBe(3600);
    expect(body.scope).toBe('read write');
  });

  it('should carry the client, scope and lifetime in its claims', async () => {
    const token = await issueToken();

    const claims = await verifyAccessToken(token, { ...VERIFY, now: START_TIME });

    expect(claims).toEqual({
      iss: TEST_ISSUER,
      sub: 'acme',
      aud: 'acme',
      client_id: 'acme',
      scope: 'read write',
      jti: expect.stringMatching(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/),
      iat: START_TIME,
      nbf: START_TIME,
      exp: START_TIME + 3600,
    });
  });

  it('should be typed as an RFC 9068 access token signed with HS256', async () => {
    const token = await issueToken();

    expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'at+jwt' });
  });

  it('should name the signing key when a key id is configured', async () => {
    const token = await issueToken(createHarness({ tokenConfig: { signingKeyId: 'key-2030-01' } }));

    expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'at+jwt', kid: 'key-2030-01' });
  });

  it('should report a configured lifetime in both expires_in and exp', async () => {
    const harness = createHarness({ tokenConfig: { accessTokenTtl: 900 } });
    const code = await obtainCode(harness);

    const body = assertTokenResponse(await exchange(harness, code));
    const claims = await verifyAccessToken(body.access_token, { ...VERIFY, now: START_TIME });

    expect(body.expires_in).toBe(900);
    expect(claims?.exp).toBe(START_TIME + 900);
  });

  it('should use a fresh jti for every token', async () => {
    const harness = createHarness();
    const first = await verifyAccessToken(await issueToken(harness), { ...VERIFY, now: START_TIME });
    const second = await verifyAccessToken(await issueToken(harness), { ...VERIFY, now: START_TIME });

    expect(first?.jti).toBeDefined();
    expect(first?.jti).not.toBe(second?.jti);
  });

  describe('verifyAccessToken', () => {
    it('should reject a token signed with another key', async () => {
      const token = await issueToken();

      const claims = await verifyAccessToken(token, {
        ...VERIFY,
        signingSecret: 'another-test-signing-secret-0123456789',
        now: START_TIME,
      });

      expect(claims).toBeNull();
    });

    it('should reject a token from another issuer', async () => {
      const token = await issueToken();

      const claims = await verifyAccessToken(token, {
        ...VERIFY,
        issuer: 'https://other.test.example',
        now: START_TIME,
      });

      expect(claims).toBeNull();
    });

    it('should reject a token at its expiry time', async () => {
      const token = await issueToken();

      expect(await verifyAccessToken(token, { ...VERIFY, now: START_TIME + 3599 })).not.toBeNull();
      expect(await verifyAccessToken(token, { ...VERIFY, now: START_TIME + 3600 })).toBeNull();
    });

    it('should reject a token before its nbf', async () => {
      const token = await issueToken();

      expect(await verifyAccessToken(token, { ...VERIFY, now: START_TIME - 1 })).toBeNull();
    });

    it('should reject a token whose payload was altered', async () => {
      const token = await issueToken();
      const [header, , signature] = token.split('.');
      const forged = Buffer.from(JSON.stringify({ iss: TEST_ISSUER, sub: 'admin' })).toString('base64url');

      expect(await verifyAccessToken(`${header}.${forged}.${signature}`, { ...VERIFY, now: START_TIME })).toBeNull();
    });

    it('should reject something that is not a JWT', async () => {
      expect(await verifyAccessToken('not-a-jwt', VERIFY)).toBeNull();
    });
  });
});
