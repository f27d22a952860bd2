import { randomUUID } from 'node:crypto';
import bcrypt from 'bcryptjs';
import { SignJWT, jwtVerify } from 'jose';
import { z } from 'zod';

import type { CredentialStore } from './store.js';
import type { Role, SessionClaims, UserRecord } from './types.js';

// Compared against when the username is unknown, so both failure paths cost one bcrypt check.
const DUMMY_HASH = bcrypt.hashSync('replydesk-no-such-user', 10);

export function authenticate(store: CredentialStore, username: string, password: string): UserRecord | null {
  const user = store.find(username);
  if (!user) {
    bcrypt.compareSync(password, DUMMY_HASH);
    return null;
  }
  return bcrypt.compareSync(password, user.passwordHash) ? user : null;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['admin', 'user']),
  name: z.string(),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

export type IssuedToken = {
  token: string;
  claims: SessionClaims;
  expiresAt: string; // ISO8601
};

export type SessionTokens = {
  issue(username: string, role: Role, displayName?: string): Promise<IssuedToken>;
  verify(token: string): Promise<SessionClaims | null>;
  revoke(token: string): Promise<void>;
};

export type SessionTokenOptions = {
  secret: string;
  ttlSeconds: number;
  now?: () => number; // ms
};

export function createSessionTokens(opts: SessionTokenOptions): SessionTokens {
  const key = new TextEncoder().encode(opts.secret);
  const now = opts.now ?? Date.now;

  // In-memory revocation list by jti (until token expiry).
  const revoked = new Map<string, number>(); // jti -> exp (seconds)

  function nowSeconds(): number {
    return Math.floor(now() / 1000);
  }

  function gcRevoked(at: number): void {
    for (const [jti, exp] of revoked.entries()) {
      if (exp <= at) revoked.delete(jti);
    }
  }

  async function decode(token: string): Promise<SessionClaims | null> {
    try {
      const out = await jwtVerify(token, key, { algorithms: ['HS256'], currentDate: new Date(now()) });
      const parsed = claimsSchema.safeParse(out.payload);
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  return {
    async issue(username, role, displayName) {
      const iat = nowSeconds();
      gcRevoked(iat);
      const claims: SessionClaims = {
        sub: username,
        role,
        name: displayName ?? username,
        jti: randomUUID(),
        iat,
        exp: iat + opts.ttlSeconds,
      };
      const token = await new SignJWT({ role: claims.role, name: claims.name })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject(claims.sub)
        .setJti(claims.jti)
        .setIssuedAt(claims.iat)
        .setExpirationTime(claims.exp)
        .sign(key);
      return { token, claims, expiresAt: new Date(claims.exp * 1000).toISOString() };
    },

    async verify(token) {
      const claims = await decode(token);
      if (!claims) return null;
      gcRevoked(nowSeconds());
      return revoked.has(claims.jti) ? null : claims;
    },

    async revoke(token) {
      const claims = await decode(token);
      if (!claims) return;
      gcRevoked(nowSeconds());
      revoked.set(claims.jti, claims.exp);
    },
  };
}
