import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import { serveStatic } from '@hono/node-server/serve-static';
import { Hono } from 'hono';
import { logger } from 'hono/logger';

import { DEFAULT_ADMIN_PASSWORD, DEV_TOKEN_SECRET, loadConfig } from './config.js';
import { OpenAICompletionClient } from './reply/completion.js';
import { buildApp } from './server.js';
import { JsonFileCredentialStore } from './store.js';

function main(): void {
  const cfg = loadConfig();

  if (!cfg.completion.apiKey) {
    console.error('Missing completion API key. Set OPENAI_API_KEY.');
    process.exit(1);
  }
  if (cfg.auth.tokenSecret === DEV_TOKEN_SECRET) {
    console.warn('TOKEN_SECRET not set; using the development secret.');
  }
  if (cfg.auth.adminPassword === DEFAULT_ADMIN_PASSWORD) {
    console.warn('ADMIN_PASSWORD not set; a first-run admin gets the default password.');
  }

  const store = new JsonFileCredentialStore({
    filePath: cfg.usersFile,
    bcryptRounds: cfg.auth.bcryptRounds,
    admin: { username: cfg.auth.adminUsername, password: cfg.auth.adminPassword, displayName: cfg.auth.adminDisplayName },
  });
  try {
    const users = store.load();
    console.log(`users: ${users.size} loaded from ${store.filePath}`);
  } catch (err) {
    // Requests touching users answer STORE_ERROR until the file is fixed.
    console.error(err instanceof Error ? err.message : String(err));
  }

  const completion = new OpenAICompletionClient({
    model: cfg.completion.model,
    apiKey: cfg.completion.apiKey,
    baseUrl: cfg.completion.baseUrl,
  });

  const { app } = buildApp({ cfg, store, completion });

  const root = new Hono();
  root.use('/api/*', logger());
  root.route('/', app);

  // Static frontend (prod): serve dist/ with SPA fallback.
  // In dev, Vite serves the frontend separately.
  const webDistRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../web/dist');
  const staticRoot = path.relative(process.cwd(), webDistRoot);
  root.use('/*', serveStatic({ root: staticRoot }));
  root.get('*', serveStatic({ path: path.join(staticRoot, 'index.html') }));

  serve({ fetch: root.fetch, port: cfg.port, hostname: cfg.host }, (info) => {
    console.log(`replydesk api listening on http://${cfg.host}:${info.port}`);
    console.log(`login required: ${cfg.auth.requireLogin} · model: ${cfg.completion.model}`);
  });
}

main();
