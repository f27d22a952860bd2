import type { AuthSessionResponse, UserPublic } from '@replydesk/contracts';

import type { StoredAuth } from './storage';

export type AppView =
  | { kind: 'loading' }
  | { kind: 'login'; notice?: string }
  | { kind: 'main'; user: UserPublic | null; canManageUsers: boolean; requireLogin: boolean };

export const SESSION_EXPIRED_NOTICE = 'A sessão expirou. Inicie sessão novamente.';

// Only a token that has not passed its expiry is worth sending to the server.
export function liveToken(auth: StoredAuth | null, nowMs: number): string | undefined {
  if (!auth) return undefined;
  const exp = Date.parse(auth.expiresAt);
  if (!Number.isFinite(exp) || exp <= nowMs) return undefined;
  return auth.token;
}

export function viewFromSession(res: AuthSessionResponse, hadToken: boolean): AppView {
  if (res.view === 'login') {
    return hadToken ? { kind: 'login', notice: SESSION_EXPIRED_NOTICE } : { kind: 'login' };
  }
  return { kind: 'main', user: res.user, canManageUsers: res.canManageUsers, requireLogin: res.requireLogin };
}
