// Canonical API contracts shared between @replydesk/api and @replydesk/web.
// Keep this file free of runtime deps so both packages can import types cheaply.

export type Role = 'admin' | 'user';

export type ApiErrorCode =
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'RATE_LIMIT'
  | 'DUPLICATE_USER'
  | 'STORE_ERROR'
  | 'GENERATION_FAILED'
  | 'INTERNAL';

export type ApiError = {
  code: ApiErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type ApiErrorResponse = {
  error: ApiError;
};

export type UserPublic = {
  username: string;
  displayName: string;
  role: Role;
};

export type AuthLoginRequest = {
  username: string;
  password: string;
};

export type AuthLoginResponse = {
  token: string;
  expiresAt: string; // ISO8601
  user: UserPublic;
};

export type AuthLogoutResponse = { ok: true };

export type SessionView =
  | { view: 'login'; reason: 'missing' | 'invalid' }
  | { view: 'main'; user: UserPublic | null; canManageUsers: boolean };

export type AuthSessionResponse = SessionView & { requireLogin: boolean };

export type SettingsResponse = {
  requireLogin: boolean;
  model: string;
  version: string;
};

export type UsersListResponse = { users: UserPublic[] };

export type UserCreateRequest = {
  username: string;
  password: string;
  displayName: string;
  role: Role;
};

export type ReplyOption = {
  id: string;
  label: string;
};

export type ReplyOptionsResponse = {
  intents: ReplyOption[];
  tones: ReplyOption[];
  lengths: ReplyOption[];
  defaults: { tone: string; length: string };
};

export type ReplyGenerateRequest = {
  email: string;
  intents: string[];
  tone?: string;
  length?: string;
  managerNotes?: string;
};

export type ReplyGenerateResponse = {
  reply: string;
  model: string;
  usage?: { promptTokens: number; completionTokens: number };
};

export type HealthResponse = {
  status: 'ok';
  timestamp: string;
  store: { users: number };
};
