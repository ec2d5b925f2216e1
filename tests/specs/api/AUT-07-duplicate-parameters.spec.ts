/**
 * AUT-07: Duplicate Parameters
 *
 * A request parameter given more than once is invalid_request, whichever
 * parameter it is and whether or not the values agree.
 */

import { describe, it, expect } from 'vitest';
import { assertOAuth2Error, invoke } from '../../support/api';
import { authorizeEvent } from '../../support/events';
import { ACME_REQUEST, createHarness } from '../../support/fixtures';

const BASE_QUERY = new URLSearchParams(ACME_REQUEST).toString();

describe('AUT-07: Duplicate Parameters', () => {
  it.each([
    ['client_id', 'client_id=globex'],
    ['redirect_uri', 'redirect_uri=https%3A%2F%2Fattacker.example%2Fcb'],
    ['state', 'state=xyz'],
    ['scope', 'scope=admin'],
  ])('should return invalid_request when %s is repeated', async (_label, extra) => {
    const harness = createHarness();

    const response = await invoke(harness.authorize, authorizeEvent(`${BASE_QUERY}&${extra}`));

    assertOAuth2Error(response, 'invalid_request');
    expect(harness.store.pending.size).toBe(0);
  });

  it('should check for repeats before reporting a missing state', async () => {
    const harness = createHarness();

    const response = await invoke(
      harness.authorize,
      authorizeEvent(
        'response_type=code&response_type=code&client_id=acme' +
          '&redirect_uri=https%3A%2F%2Facme.example%2Fcb&scope=read'
      )
    );

    assertOAuth2Error(response, 'invalid_request');
  });

  it('should ignore unknown parameters given once', async () => {
    const harness = createHarness();

    const response = await invoke(harness.authorize, authorizeEvent(`${BASE_QUERY}&prompt=consent`));

    expect(response.status).toBe(200);
  });
});
