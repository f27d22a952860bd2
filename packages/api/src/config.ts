import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export type RateLimitBudget = { points: number; windowSeconds: number };

export type ReplyDeskConfig = {
  version: string;
  port: number;
  host: string;
  nodeEnv: string;
  usersFile: string;
  auth: {
    requireLogin: boolean;
    tokenSecret: string;
    tokenTtlSeconds: number;
    adminUsername: string;
    adminPassword: string;
    adminDisplayName: string;
    bcryptRounds: number;
  };
  completion: {
    apiKey: string;
    baseUrl?: string;
    model: string;
    temperature: number;
  };
  rateLimits: {
    login: RateLimitBudget;
    generate: RateLimitBudget;
  };
};

export const DEV_TOKEN_SECRET = 'replydesk-dev-secret';
export const DEFAULT_ADMIN_PASSWORD = 'admin1234';

function envStr(name: string, fallback = ''): string {
  const v = process.env[name];
  return typeof v === 'string' && v.trim().length > 0 ? v.trim() : fallback;
}

function envNum(name: string, fallback: number): number {
  const raw = envStr(name, '');
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = envStr(name, '').toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

let envBootstrapped = false;

function loadEnvFile(filePath: string): void {
  if (!fs.existsSync(filePath)) return;
  const txt = fs.readFileSync(filePath, 'utf8');
  for (const line of txt.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const idx = trimmed.indexOf('=');
    if (idx <= 0) continue;
    const key = trimmed.slice(0, idx).trim();
    let val = trimmed.slice(idx + 1).trim();
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (!key) continue;
    if (process.env[key] != null) continue; // don't override explicit env
    process.env[key] = val;
  }
}

function bootstrapEnv(): void {
  if (envBootstrapped) return;
  envBootstrapped = true;

  // Env files are found from the source location, not the cwd, so `npm run -w` works too.
  const apiDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
  const repoRoot = path.resolve(apiDir, '../..');

  loadEnvFile(path.join(repoRoot, '.env'));
  loadEnvFile(path.join(repoRoot, '.env.local'));
  loadEnvFile(path.join(apiDir, '.env'));
  loadEnvFile(path.join(apiDir, '.env.local'));
}

export function loadConfig(): ReplyDeskConfig {
  bootstrapEnv();

  const nodeEnv = envStr('NODE_ENV', 'development');
  const tokenSecret = envStr('TOKEN_SECRET', '');
  if (!tokenSecret && nodeEnv === 'production') {
    throw new Error('TOKEN_SECRET is not defined. Check your .env file.');
  }

  return {
    version: envStr('npm_package_version', '0.1.0'),
    port: envNum('PORT', 3000),
    host: envStr('HOST', '0.0.0.0'),
    nodeEnv,
    usersFile: path.resolve(envStr('USERS_FILE', './data/users.json')),
    auth: {
      requireLogin: envBool('REQUIRE_LOGIN', true),
      tokenSecret: tokenSecret || DEV_TOKEN_SECRET,
      tokenTtlSeconds: Math.max(1, Math.floor(envNum('TOKEN_TTL_MINUTES', 30) * 60)),
      adminUsername: envStr('ADMIN_USERNAME', 'admin'),
      adminPassword: envStr('ADMIN_PASSWORD', DEFAULT_ADMIN_PASSWORD),
      adminDisplayName: envStr('ADMIN_DISPLAY_NAME', 'Administrador'),
      bcryptRounds: envNum('BCRYPT_ROUNDS', 10),
    },
    completion: {
      apiKey: envStr('OPENAI_API_KEY', ''),
      baseUrl: envStr('OPENAI_BASE_URL', '') || undefined,
      model: envStr('COMPLETION_MODEL', 'gpt-4o-mini'),
      temperature: envNum('COMPLETION_TEMPERATURE', 0.7),
    },
    rateLimits: {
      login: {
        points: envNum('RATE_LIMIT_LOGIN_POINTS', 10),
        windowSeconds: envNum('RATE_LIMIT_LOGIN_WINDOW_SECONDS', 60),
      },
      generate: {
        points: envNum('RATE_LIMIT_GENERATE_POINTS', 20),
        windowSeconds: envNum('RATE_LIMIT_GENERATE_WINDOW_SECONDS', 60),
      },
    },
  };
}
