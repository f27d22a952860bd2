import type {
  ApiError,
  ApiErrorResponse,
  AuthLoginRequest,
  AuthLoginResponse,
  AuthLogoutResponse,
  AuthSessionResponse,
  ReplyGenerateRequest,
  ReplyGenerateResponse,
  ReplyOptionsResponse,
  SettingsResponse,
  UserCreateRequest,
  UserPublic,
  UsersListResponse,
} from '@replydesk/contracts';

export class ApiRequestError extends Error {
  readonly status: number;
  readonly apiError: ApiError;
  constructor(status: number, apiError: ApiError) {
    super(apiError.message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.apiError = apiError;
  }
}

async function readJsonSafe(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return null;
  }
}

function isApiErrorResponse(payload: unknown): payload is ApiErrorResponse {
  if (!payload || typeof payload !== 'object' || !('error' in payload)) return false;
  const err = payload.error;
  return (
    !!err &&
    typeof err === 'object' &&
    'code' in err &&
    typeof err.code === 'string' &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

export async function apiFetchJson<T>(
  path: string,
  init: RequestInit & { token?: string } = {},
): Promise<T> {
  const { token, headers, ...rest } = init;
  const merged = new Headers(headers);
  if (token) merged.set('Authorization', `Bearer ${token}`);
  const res = await fetch(path, { ...rest, headers: merged });

  if (!res.ok) {
    const payload = await readJsonSafe(res);
    const apiError: ApiError = isApiErrorResponse(payload)
      ? payload.error
      : { code: 'INTERNAL', message: `Request failed (${res.status})`, details: { path } };
    throw new ApiRequestError(res.status, apiError);
  }

  const out: T = await res.json();
  return out;
}

function jsonBody(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export async function getSettings(): Promise<SettingsResponse> {
  return apiFetchJson<SettingsResponse>('/api/settings');
}

export async function login(req: AuthLoginRequest): Promise<AuthLoginResponse> {
  return apiFetchJson<AuthLoginResponse>('/api/auth/login', jsonBody(req));
}

export async function logout(token: string): Promise<AuthLogoutResponse> {
  return apiFetchJson<AuthLogoutResponse>('/api/auth/logout', { method: 'POST', token });
}

export async function getSession(token?: string): Promise<AuthSessionResponse> {
  return apiFetchJson<AuthSessionResponse>('/api/auth/session', { token });
}

export async function listUsers(token: string): Promise<UsersListResponse> {
  return apiFetchJson<UsersListResponse>('/api/users', { token });
}

export async function createUser(token: string, req: UserCreateRequest): Promise<UserPublic> {
  return apiFetchJson<UserPublic>('/api/users', { ...jsonBody(req), token });
}

export async function getReplyOptions(token?: string): Promise<ReplyOptionsResponse> {
  return apiFetchJson<ReplyOptionsResponse>('/api/reply/options', { token });
}

export async function generateReply(token: string | undefined, req: ReplyGenerateRequest): Promise<ReplyGenerateResponse> {
  return apiFetchJson<ReplyGenerateResponse>('/api/reply/generate', { ...jsonBody(req), token });
}
