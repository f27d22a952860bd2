import { Hono } from 'hono';
import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import type {
  ApiErrorCode,
  AuthLoginResponse,
  AuthSessionResponse,
  HealthResponse,
  ReplyGenerateResponse,
  SettingsResponse,
  UsersListResponse,
} from '@replydesk/contracts';

import { authenticate, createSessionTokens } from './auth.js';
import type { SessionTokens } from './auth.js';
import type { ReplyDeskConfig } from './config.js';
import { CredentialStoreError, DuplicateUserError, GenerationFailedError, PromptInputError } from './errors.js';
import { guardSession, sessionFromAuthorization } from './guard.js';
import { clientIpKey, createRateLimiter } from './rateLimit.js';
import { defaultCatalog, publicOptions } from './reply/catalog.js';
import type { ReplyCatalog } from './reply/catalog.js';
import type { CompletionClient } from './reply/completion.js';
import { buildPrompt } from './reply/prompt.js';
import type { CompletionPrompt } from './reply/prompt.js';
import type { CredentialStore } from './store.js';
import { toUserPublic } from './types.js';
import type { Variables } from './types.js';

type Env = { Variables: Variables };

function nowIso(): string {
  return new Date().toISOString();
}

function apiError(code: ApiErrorCode, message: string, details?: Record<string, unknown>) {
  return { error: { code, message, ...(details ? { details } : {}) } };
}

const loginSchema = z.object({ username: z.string(), password: z.string() });
const userCreateSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9._-]+$/),
  password: z.string().min(8).max(128),
  displayName: z.string().trim().min(1).max(120),
  role: z.enum(['admin', 'user']),
});
const generateSchema = z.object({
  email: z.string().max(20_000),
  intents: z.array(z.string()).max(20),
  tone: z.string().optional(),
  length: z.string().optional(),
  managerNotes: z.string().max(2_000).optional(),
});

export type AppDeps = {
  cfg: ReplyDeskConfig;
  store: CredentialStore;
  completion: CompletionClient;
  tokens?: SessionTokens;
  catalog?: ReplyCatalog;
  now?: () => number;
};

export function buildApp(deps: AppDeps) {
  const { cfg, store, completion } = deps;
  const tokens = deps.tokens ?? createSessionTokens({ secret: cfg.auth.tokenSecret, ttlSeconds: cfg.auth.tokenTtlSeconds, now: deps.now });
  const catalog = deps.catalog ?? defaultCatalog;
  const app = new Hono<Env>();

  app.onError((err, c) => {
    if (err instanceof z.ZodError) {
      return c.json(apiError('INVALID_REQUEST', 'Pedido inválido', { issues: err.issues }), 400);
    }
    if (err instanceof SyntaxError) {
      return c.json(apiError('INVALID_REQUEST', 'Pedido inválido'), 400);
    }
    if (err instanceof CredentialStoreError) {
      console.error(`[store] ${err.message}`);
      return c.json(apiError('STORE_ERROR', 'Não foi possível aceder aos utilizadores.'), 500);
    }
    console.error('[api] unhandled error', err);
    // Avoid leaking internal errors.
    return c.json(apiError('INTERNAL', 'Request failed'), 500);
  });

  const requireSession = createMiddleware<Env>(async (c, next) => {
    const session = sessionFromAuthorization(c.req.header('authorization'));
    const decision = await guardSession(tokens, session, { requireLogin: cfg.auth.requireLogin });
    if (decision.view === 'login') {
      return c.json(apiError('UNAUTHORIZED', decision.reason === 'invalid' ? 'Sessão expirada' : 'Unauthorized'), 401);
    }
    c.set('session', decision);
    c.set('token', session.token);
    await next();
  });

  const onlyAdmin = createMiddleware<Env>(async (c, next) => {
    if (!c.get('session').canManageUsers) return c.json(apiError('FORBIDDEN', 'Forbidden'), 403);
    await next();
  });

  const rateLimit = createRateLimiter(deps.now);

  // Runs after requireSession, so the user is verified; anonymous callers share their address's budget.
  const sessionKey = (c: Context<Env>): string => {
    const user = c.get('session').user;
    return user ? `user:${user.username}` : clientIpKey(c);
  };

  app.get('/api/health', (c) => {
    let users = 0;
    try {
      users = store.list().length;
    } catch (err) {
      console.error(`[store] ${err instanceof Error ? err.message : String(err)}`);
    }
    return c.json({ status: 'ok', timestamp: nowIso(), store: { users } } satisfies HealthResponse);
  });

  app.get('/api/settings', (c) => {
    return c.json({ requireLogin: cfg.auth.requireLogin, model: completion.model, version: cfg.version } satisfies SettingsResponse);
  });

  app.post('/api/auth/login', rateLimit<Env>({ key: clientIpKey, ...cfg.rateLimits.login }), async (c) => {
    const parsed = loginSchema.parse(await c.req.json());
    const user = authenticate(store, parsed.username.trim(), parsed.password);
    if (!user) {
      return c.json(apiError('UNAUTHORIZED', 'Utilizador ou palavra-passe incorretos.'), 401);
    }
    const issued = await tokens.issue(user.username, user.role, user.displayName);
    return c.json({ token: issued.token, expiresAt: issued.expiresAt, user: toUserPublic(user) } satisfies AuthLoginResponse);
  });

  app.post('/api/auth/logout', requireSession, async (c) => {
    const token = c.get('token');
    if (token) await tokens.revoke(token);
    return c.json({ ok: true as const });
  });

  app.get('/api/auth/session', async (c) => {
    const decision = await guardSession(tokens, sessionFromAuthorization(c.req.header('authorization')), {
      requireLogin: cfg.auth.requireLogin,
    });
    const body: AuthSessionResponse =
      decision.view === 'login'
        ? { view: 'login', reason: decision.reason, requireLogin: cfg.auth.requireLogin }
        : { view: 'main', user: decision.user, canManageUsers: decision.canManageUsers, requireLogin: cfg.auth.requireLogin };
    return c.json(body);
  });

  app.get('/api/users', requireSession, onlyAdmin, (c) => {
    return c.json({ users: store.list().map(toUserPublic) } satisfies UsersListResponse);
  });

  app.post('/api/users', requireSession, onlyAdmin, async (c) => {
    const parsed = userCreateSchema.parse(await c.req.json());
    try {
      const user = store.create(parsed);
      return c.json(toUserPublic(user), 201);
    } catch (err) {
      if (err instanceof DuplicateUserError) {
        return c.json(apiError('DUPLICATE_USER', 'Esse utilizador já existe.', { username: err.username }), 409);
      }
      throw err;
    }
  });

  app.get('/api/reply/options', requireSession, (c) => {
    return c.json(publicOptions(catalog));
  });

  app.post('/api/reply/generate', requireSession, rateLimit<Env>({ key: sessionKey, ...cfg.rateLimits.generate }), async (c) => {
    const parsed = generateSchema.parse(await c.req.json());
    let prompt: CompletionPrompt;
    try {
      prompt = buildPrompt(parsed, catalog, { temperature: cfg.completion.temperature });
    } catch (err) {
      if (err instanceof PromptInputError) {
        return c.json(apiError('INVALID_REQUEST', err.message, { field: err.field }), 400);
      }
      throw err;
    }

    try {
      const out = await completion.complete(prompt);
      return c.json({ reply: out.text, model: out.model, usage: out.usage } satisfies ReplyGenerateResponse);
    } catch (err) {
      if (err instanceof GenerationFailedError) {
        console.error(`[reply] ${err.message}`);
        return c.json(apiError('GENERATION_FAILED', 'A geração falhou, tente novamente.'), 502);
      }
      throw err;
    }
  });

  return { app, tokens };
}
