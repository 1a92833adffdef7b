import type { IdentityProvider, ResolvedIdentity } from './identity-provider.js';

export class InMemoryIdentityProvider implements IdentityProvider {
  private readonly identitiesByAssertion = new Map<string, ResolvedIdentity>();

  public register(assertion: string, identity: ResolvedIdentity): void {
    this.identitiesByAssertion.set(assertion, {
      ...identity,
      roleClaims: identity.roleClaims.map((claim) => ({ ...claim }))
    });
  }

  public revoke(assertion: string): void {
    this.identitiesByAssertion.delete(assertion);
  }

  public resolveAssertion(assertion: string): Promise<ResolvedIdentity | null> {
    const identity = this.identitiesByAssertion.get(assertion);
    if (identity === undefined) {
      return Promise.resolve(null);
    }

    return Promise.resolve({
      ...identity,
      roleClaims: identity.roleClaims.map((claim) => ({ ...claim }))
    });
  }
}
