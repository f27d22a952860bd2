import type { UserPublic } from '@replydesk/contracts';

const AUTH_KEY = 'replydesk.auth';

export type StoredAuth = {
  token: string;
  expiresAt: string; // ISO8601
  user: UserPublic;
};

function isStoredAuth(value: unknown): value is StoredAuth {
  if (!value || typeof value !== 'object') return false;
  if (!('token' in value) || typeof value.token !== 'string' || !value.token) return false;
  if (!('expiresAt' in value) || typeof value.expiresAt !== 'string') return false;
  if (!('user' in value) || !value.user || typeof value.user !== 'object') return false;
  return 'username' in value.user && typeof value.user.username === 'string';
}

export function loadAuth(): StoredAuth | null {
  try {
    const raw = sessionStorage.getItem(AUTH_KEY);
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    return isStoredAuth(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function saveAuth(auth: StoredAuth): void {
  sessionStorage.setItem(AUTH_KEY, JSON.stringify(auth));
}

export function clearAuth(): void {
  sessionStorage.removeItem(AUTH_KEY);
}
