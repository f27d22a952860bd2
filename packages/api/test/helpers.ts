import type { ReplyDeskConfig } from '../src/config.js';
import { CredentialStoreError, GenerationFailedError } from '../src/errors.js';
import type { Completion, CompletionClient } from '../src/reply/completion.js';
import type { CompletionPrompt } from '../src/reply/prompt.js';
import { MemoryCredentialStore } from '../src/store.js';
import type { UserRecord } from '../src/types.js';

export const ADMIN_PASSWORD = 'test-admin-pass';

export function testConfig(patch: { auth?: Partial<ReplyDeskConfig['auth']>; rateLimits?: Partial<ReplyDeskConfig['rateLimits']> } = {}): ReplyDeskConfig {
  return {
    version: '0.0.0-test',
    port: 0,
    host: '127.0.0.1',
    nodeEnv: 'test',
    usersFile: '/nonexistent/users.json',
    auth: {
      requireLogin: true,
      tokenSecret: 'test-secret',
      tokenTtlSeconds: 30 * 60,
      adminUsername: 'admin',
      adminPassword: ADMIN_PASSWORD,
      adminDisplayName: 'Administrador',
      bcryptRounds: 4,
      ...patch.auth,
    },
    completion: { apiKey: 'test-key', model: 'test-model', temperature: 0.5 },
    rateLimits: {
      login: { points: 100, windowSeconds: 60 },
      generate: { points: 100, windowSeconds: 60 },
      ...patch.rateLimits,
    },
  };
}

export function testStore(cfg: ReplyDeskConfig = testConfig()): MemoryCredentialStore {
  return new MemoryCredentialStore({
    bcryptRounds: cfg.auth.bcryptRounds,
    admin: { username: cfg.auth.adminUsername, password: cfg.auth.adminPassword, displayName: cfg.auth.adminDisplayName },
  });
}

export class FlakyStore extends MemoryCredentialStore {
  failReads = false;
  failWrites = false;

  protected override read(): Map<string, UserRecord> | null {
    if (this.failReads) throw new CredentialStoreError('users file unreadable');
    return super.read();
  }

  protected override write(users: ReadonlyMap<string, UserRecord>): void {
    if (this.failWrites) throw new CredentialStoreError('disk full');
    super.write(users);
  }
}

export function flakyStore(cfg: ReplyDeskConfig = testConfig()): FlakyStore {
  return new FlakyStore({
    bcryptRounds: cfg.auth.bcryptRounds,
    admin: { username: cfg.auth.adminUsername, password: cfg.auth.adminPassword, displayName: cfg.auth.adminDisplayName },
  });
}

export class FakeCompletion implements CompletionClient {
  readonly model = 'test-model';
  readonly prompts: CompletionPrompt[] = [];
  fail = false;
  reply = 'Caro cliente, obrigado pelo seu contacto.';

  async complete(prompt: CompletionPrompt): Promise<Completion> {
    this.prompts.push(prompt);
    if (this.fail) throw new GenerationFailedError('upstream unavailable');
    return { text: this.reply, model: this.model };
  }
}
