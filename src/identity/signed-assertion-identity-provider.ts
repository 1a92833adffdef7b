import { Buffer } from 'node:buffer';
import { createHmac, timingSafeEqual } from 'node:crypto';

import { z } from 'zod';

import type { Clock } from '../domain/clock.js';
import { roleClaimSchema, type IdentityProvider, type ResolvedIdentity } from './identity-provider.js';

const assertionPayloadSchema = z.object({
  sub: z.string().min(1),
  tid: z.string().uuid(),
  roles: z.array(roleClaimSchema).default([]),
  exp: z.number().int().positive()
});

type AssertionPayload = z.infer<typeof assertionPayloadSchema>;

function sign(encodedPayload: string, secret: string): Buffer {
  return createHmac('sha256', secret).update(encodedPayload).digest();
}

/**
 * Assertions minted by the SSO gateway: `base64url(json).base64url(hmac-sha256)`.
 * `exp` is in epoch seconds.
 */
export class SignedAssertionIdentityProvider implements IdentityProvider {
  public constructor(
    private readonly secret: string,
    private readonly clock: Clock
  ) {}

  public issue(identity: ResolvedIdentity, ttlSeconds: number): string {
    const payload: AssertionPayload = {
      sub: identity.userId,
      tid: identity.tenantId,
      roles: identity.roleClaims,
      exp: Math.floor(this.clock.now().getTime() / 1_000) + ttlSeconds
    };

    const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');
    return `${encodedPayload}.${sign(encodedPayload, this.secret).toString('base64url')}`;
  }

  public resolveAssertion(assertion: string): Promise<ResolvedIdentity | null> {
    const [encodedPayload, encodedSignature, ...rest] = assertion.split('.');
    if (encodedPayload === undefined || encodedSignature === undefined || rest.length > 0) {
      return Promise.resolve(null);
    }

    const expected = sign(encodedPayload, this.secret);
    const received = Buffer.from(encodedSignature, 'base64url');
    if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
      return Promise.resolve(null);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf8'));
    } catch {
      return Promise.resolve(null);
    }

    const parsed = assertionPayloadSchema.safeParse(decoded);
    if (!parsed.success || parsed.data.exp * 1_000 <= this.clock.now().getTime()) {
      return Promise.resolve(null);
    }

    return Promise.resolve({
      userId: parsed.data.sub,
      tenantId: parsed.data.tid,
      roleClaims: parsed.data.roles
    });
  }
}
