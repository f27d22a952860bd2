import type { SessionTokens } from './auth.js';
import type { GuardDecision, Session } from './types.js';

export type GuardOptions = {
  requireLogin: boolean;
};

/**
 * Decides which view a session reaches. An invalid token counts as no token:
 * with login required both land on the Login View, otherwise on an anonymous Main View.
 */
export async function guardSession(tokens: SessionTokens, session: Session, opts: GuardOptions): Promise<GuardDecision> {
  const token = session.token?.trim();
  const claims = token ? await tokens.verify(token) : null;

  if (claims) {
    return {
      view: 'main',
      user: { username: claims.sub, displayName: claims.name, role: claims.role },
      canManageUsers: claims.role === 'admin',
      claims,
    };
  }

  if (!opts.requireLogin) return { view: 'main', user: null, canManageUsers: false };
  return { view: 'login', reason: token ? 'invalid' : 'missing' };
}

export function sessionFromAuthorization(header: string | undefined): Session {
  if (!header?.startsWith('Bearer ')) return {};
  const token = header.slice('Bearer '.length).trim();
  return token ? { token } : {};
}
