/**
 * TOK-05: Client Binding
 *
 * A code issued to one client cannot be redeemed by another, even one that
 * authenticates correctly.
 */

import { describe, it, expect } from 'vitest';
import { assertOAuth2Error, assertTokenResponse } from '../../support/api';
import { exchange, obtainCode } from '../../support/flow';
import { GLOBEX_SECRET, createHarness } from '../../support/fixtures';

describe('TOK-05: Client Binding', () => {
  it('should return invalid_grant when another client presents the code', async () => {
    const harness = createHarness();
    const code = await obtainCode(harness);

    const response = await exchange(harness, code, {
      client_id: 'globex',
      client_secret: GLOBEX_SECRET,
    });

    assertOAuth2Error(response, 'invalid_grant');
  });

  it('should return invalid_grant even with the other client\'s own redirect URI', async () => {
    const harness = createHarness();
    const code = await obtainCode(harness);

    const response = await exchange(harness, code, {
      client_id: 'globex',
      client_secret: GLOBEX_SECRET,
      redirect_uri: 'https://globex.example/callback',
    });

    assertOAuth2Error(response, 'invalid_grant');
  });

  it('should not spend the code when another client presents it', async () => {
    const harness = createHarness();
    const code = await obtainCode(harness);
    await exchange(harness, code, { client_id: 'globex', client_secret: GLOBEX_SECRET });

    const response = await exchange(harness, code);

    assertTokenResponse(response);
    expect(response.status).toBe(200);
  });
});
