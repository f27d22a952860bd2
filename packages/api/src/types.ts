import type { Role, UserPublic } from '@replydesk/contracts';

export type { Role };

export interface UserRecord {
  username: string;
  passwordHash: string;
  displayName: string;
  role: Role;
}

export interface NewUser {
  username: string;
  password: string;
  displayName: string;
  role: Role;
}

export interface SessionClaims {
  sub: string; // username
  role: Role;
  name: string; // display name
  jti: string;
  iat: number; // seconds
  exp: number; // seconds
}

// Held by whoever renders for one user; never process-wide.
export interface Session {
  token?: string;
}

export type SessionUser = UserPublic;

export type GuardDecision =
  | { view: 'login'; reason: 'missing' | 'invalid' }
  | { view: 'main'; user: SessionUser | null; canManageUsers: boolean; claims?: SessionClaims };

export type MainSession = Extract<GuardDecision, { view: 'main' }>;

export type Variables = {
  session: MainSession;
  token: string | undefined;
};

export function toUserPublic(user: Pick<UserRecord, 'username' | 'displayName' | 'role'>): UserPublic {
  return { username: user.username, displayName: user.displayName, role: user.role };
}
