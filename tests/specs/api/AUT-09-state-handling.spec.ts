/**
 * AUT-09: State Handling
 *
 * state is opaque to the server: kept verbatim up to 512 characters and
 * escaped wherever it is written into the consent page.
 */

import { describe, it, expect } from 'vitest';
import { assertOAuth2Error, invoke } from '../../support/api';
import { authorizeEvent } from '../../support/events';
import { ACME_REQUEST, createHarness } from '../../support/fixtures';

describe('AUT-09: State Handling', () => {
  it('should accept a state of 512 characters', async () => {
    const harness = createHarness();

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...ACME_REQUEST, state: 's'.repeat(512) })
    );

    expect(response.status).toBe(200);
  });

  it('should return invalid_state for a state longer than 512 characters', async () => {
    const harness = createHarness();

    const response = await invoke(
      harness.authorize,
      authorizeEvent({ ...ACME_REQUEST, state: 's'.repeat(513) })
    );

    assertOAuth2Error(response, 'invalid_state');
  });

  it('should escape markup in state when writing it into the page', async () => {
    const harness = createHarness();
    const state = '"><script>alert(1)</script>';

    const response = await invoke(harness.authorize, authorizeEvent({ ...ACME_REQUEST, state }));

    expect(response.status).toBe(200);
    expect(response.body).toContain(
      '<input type="hidden" name="state" value="&quot;&gt;&lt;script&gt;alert(1)&lt;/script&gt;">'
    );
    expect(response.body).not.toContain('<script>');
  });

  it('should store state verbatim', async () => {
    const harness = createHarness();
    const state = 'a b&c=d/é';

    await invoke(harness.authorize, authorizeEvent({ ...ACME_REQUEST, state }));

    const [item] = [...harness.store.pending.values()];
    expect(item.state).toBe(state);
  });
});
