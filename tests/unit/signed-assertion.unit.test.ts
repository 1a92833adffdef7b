import { Buffer } from 'node:buffer';

import { describe, expect, it } from 'vitest';

import { SignedAssertionIdentityProvider } from '../../src/identity/signed-assertion-identity-provider.js';
import { ManualClock } from '../helpers/manual-clock.js';

const TENANT_ID = '6f1c2d3e-4a5b-4c6d-8e9f-0a1b2c3d4e5f';

const identity = {
  userId: 'club-owner',
  tenantId: TENANT_ID,
  roleClaims: [{ role: 'Owner' as const, scope: 'tenant' as const }]
};

describe('signed identity assertions', () => {
  it('resolves an assertion it issued', async () => {
    const provider = new SignedAssertionIdentityProvider('test-secret-for-assertions', new ManualClock());
    const assertion = provider.issue(identity, 300);

    await expect(provider.resolveAssertion(assertion)).resolves.toEqual(identity);
  });

  it('rejects assertions signed with another secret', async () => {
    const clock = new ManualClock();
    const issuer = new SignedAssertionIdentityProvider('other-test-secret-value', clock);
    const provider = new SignedAssertionIdentityProvider('test-secret-for-assertions', clock);

    await expect(provider.resolveAssertion(issuer.issue(identity, 300))).resolves.toBeNull();
  });

  it('rejects a payload swapped under an existing signature', async () => {
    const provider = new SignedAssertionIdentityProvider('test-secret-for-assertions', new ManualClock());
    const [, signature] = provider.issue(identity, 300).split('.');
    const forged = Buffer.from(JSON.stringify({ sub: 'intruder', tid: TENANT_ID, roles: [], exp: 4_102_444_800 })).toString('base64url');

    await expect(provider.resolveAssertion(`${forged}.${signature ?? ''}`)).resolves.toBeNull();
  });

  it('rejects expired and malformed assertions', async () => {
    const clock = new ManualClock();
    const provider = new SignedAssertionIdentityProvider('test-secret-for-assertions', clock);
    const assertion = provider.issue(identity, 60);

    clock.advanceMinutes(1);
    await expect(provider.resolveAssertion(assertion)).resolves.toBeNull();
    await expect(provider.resolveAssertion('not-an-assertion')).resolves.toBeNull();
    await expect(provider.resolveAssertion('a.b.c')).resolves.toBeNull();
  });
});
