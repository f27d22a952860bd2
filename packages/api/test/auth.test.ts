import { describe, expect, it } from 'vitest';

import { authenticate, createSessionTokens } from '../src/auth.js';
import { ADMIN_PASSWORD, testStore } from './helpers.js';

const T0 = Date.UTC(2026, 0, 15, 9, 0, 0);
const MINUTE = 60 * 1000;

function clock(start = T0) {
  let nowMs = start;
  return {
    now: () => nowMs,
    advance: (ms: number) => {
      nowMs += ms;
    },
  };
}

describe('authenticate', () => {
  it('accepts the created password and rejects anything else', () => {
    const store = testStore();
    store.create({ username: 'alice', password: 'hunter2', displayName: 'Alice', role: 'user' });

    const ok = authenticate(store, 'alice', 'hunter2');
    expect(ok?.role).toBe('user');
    expect(ok?.displayName).toBe('Alice');

    expect(authenticate(store, 'alice', 'wrong')).toBeNull();
    expect(authenticate(store, 'alice', 'Hunter2')).toBeNull();
    expect(authenticate(store, 'bob', 'hunter2')).toBeNull();
  });

  it('accepts the default admin with the configured admin password', () => {
    const store = testStore();
    expect(store.list().map((u) => u.username)).toEqual(['admin']);
    expect(authenticate(store, 'admin', ADMIN_PASSWORD)?.role).toBe('admin');
    expect(authenticate(store, 'admin', 'admin1234')).toBeNull();
  });

  it('never stores the plaintext password', () => {
    const store = testStore();
    const record = store.create({ username: 'erin', password: 'pw-erin-123', displayName: 'Erin', role: 'admin' });
    expect(record.passwordHash).not.toContain('pw-erin-123');
    expect(record.passwordHash.startsWith('$2')).toBe(true);
  });
});

describe('createSessionTokens', () => {
  it('verifies a fresh token and carries subject, role and name', async () => {
    const c = clock();
    const tokens = createSessionTokens({ secret: 'test-secret', ttlSeconds: 1800, now: c.now });
    const issued = await tokens.issue('alice', 'user', 'Alice');

    expect(issued.expiresAt).toBe('2026-01-15T09:30:00.000Z');
    const claims = await tokens.verify(issued.token);
    expect(claims).toMatchObject({ sub: 'alice', role: 'user', name: 'Alice', iat: T0 / 1000, exp: T0 / 1000 + 1800 });
  });

  it('rejects a token once 30 minutes have passed', async () => {
    const c = clock();
    const tokens = createSessionTokens({ secret: 'test-secret', ttlSeconds: 1800, now: c.now });
    const { token } = await tokens.issue('alice', 'user');

    c.advance(29 * MINUTE);
    expect(await tokens.verify(token)).not.toBeNull();
    c.advance(1 * MINUTE);
    expect(await tokens.verify(token)).toBeNull();
  });

  it('rejects a token signed with another secret', async () => {
    const c = clock();
    const issuer = createSessionTokens({ secret: 'test-secret', ttlSeconds: 1800, now: c.now });
    const other = createSessionTokens({ secret: 'another-secret', ttlSeconds: 1800, now: c.now });
    const { token } = await other.issue('alice', 'admin');

    expect(await issuer.verify(token)).toBeNull();
  });

  it('rejects a token whose payload was tampered with', async () => {
    const c = clock();
    const tokens = createSessionTokens({ secret: 'test-secret', ttlSeconds: 1800, now: c.now });
    const { token } = await tokens.issue('alice', 'user', 'Alice');

    const [header, payload, signature] = token.split('.');
    const claims = JSON.parse(Buffer.from(payload ?? '', 'base64url').toString('utf8'));
    const forged = Buffer.from(JSON.stringify({ ...claims, role: 'admin' }), 'utf8').toString('base64url');

    expect(await tokens.verify(`${header}.${forged}.${signature}`)).toBeNull();
    expect(await tokens.verify('not-a-token')).toBeNull();
  });

  it('rejects a revoked token but keeps other tokens valid', async () => {
    const c = clock();
    const tokens = createSessionTokens({ secret: 'test-secret', ttlSeconds: 1800, now: c.now });
    const a = await tokens.issue('alice', 'user');
    const b = await tokens.issue('alice', 'user');

    await tokens.revoke(a.token);
    expect(await tokens.verify(a.token)).toBeNull();
    expect((await tokens.verify(b.token))?.sub).toBe('alice');

    await expect(tokens.revoke('garbage')).resolves.toBeUndefined();
  });
});
