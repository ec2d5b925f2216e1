/**
 * REQ-01: Token Request Body
 */

import { describe, it, expect } from 'vitest';
import { findDuplicateFormParams, parseTokenRequest } from '@authcode/oauth2-token';
import { tokenEvent } from '../../support/events';

describe('REQ-01: Token Request Body', () => {
  it('should parse a form body regardless of media type case and parameters', () => {
    const parsed = parseTokenRequest(
      tokenEvent('grant_type=authorization_code&code=c1', {
        contentType: 'Application/X-WWW-Form-URLEncoded; charset=UTF-8',
      })
    );

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.params.get('code')).toBe('c1');
    }
  });

  it('should list every repeated form parameter once', () => {
    const params = new URLSearchParams('code=a&code=b&code=c&state=1&state=2&grant_type=x');

    expect(findDuplicateFormParams(params)).toEqual(['code', 'state']);
    expect(parseTokenRequest(tokenEvent('code=a&code=b'))).toEqual({
      ok: false,
      reason: 'DUPLICATE_PARAMETER',
      duplicates: ['code'],
    });
  });

  it('should keep only string members of a JSON object', () => {
    const parsed = parseTokenRequest(
      tokenEvent('{"code":"c1","redirect_uri":42,"client_id":null}', { contentType: 'application/json' })
    );

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect([...parsed.params.keys()]).toEqual(['code']);
    }
  });

  it.each([
    ['invalid JSON', '{"code":', 'application/json'],
    ['a JSON array', '["code"]', 'application/json'],
    ['a JSON string', '"code"', 'application/json'],
    ['a plain text body', 'code=c1', 'text/plain'],
    ['a missing content type', 'code=c1', ''],
  ])('should reject %s as a malformed body', (_label, body, contentType) => {
    expect(parseTokenRequest(tokenEvent(body, { contentType }))).toEqual({ ok: false, reason: 'MALFORMED_BODY' });
  });

  it('should decode a base64 body before parsing', () => {
    const parsed = parseTokenRequest(tokenEvent('code=c1', { base64: true }));

    expect(parsed.ok && parsed.params.get('code')).toBe('c1');
  });
});
