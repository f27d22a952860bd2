import fs from 'node:fs';
import path from 'node:path';
import bcrypt from 'bcryptjs';
import { z } from 'zod';

import { CredentialStoreError, DuplicateUserError } from './errors.js';
import type { NewUser, UserRecord } from './types.js';

export type DefaultAdmin = {
  username: string;
  password: string;
  displayName: string;
};

export type CredentialStoreOptions = {
  admin: DefaultAdmin;
  bcryptRounds?: number;
};

export interface CredentialStore {
  load(): ReadonlyMap<string, UserRecord>;
  find(username: string): UserRecord | undefined;
  list(): UserRecord[];
  create(input: NewUser): UserRecord;
  persist(): void;
}

const storedUserSchema = z.object({
  passwordHash: z.string().min(1),
  displayName: z.string(),
  role: z.enum(['admin', 'user']),
});

// Users are read as entries: a parsed record would drop a key such as "__proto__".
const usersFileSchema = z.object({
  version: z.literal(1),
  users: z.custom<object>((v) => typeof v === 'object' && v !== null && !Array.isArray(v)),
});

const userEntriesSchema = z.array(z.tuple([z.string(), storedUserSchema]));

type StoredUser = z.infer<typeof storedUserSchema>;

function ensureDir(p: string): void {
  fs.mkdirSync(p, { recursive: true });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Username-keyed user mapping held in memory. Subclasses only decide where the
 * mapping is read from and written to; every mutation rewrites it whole.
 */
export abstract class MapCredentialStore implements CredentialStore {
  private users = new Map<string, UserRecord>();
  private loaded = false;
  private readonly admin: DefaultAdmin;
  private readonly bcryptRounds: number;

  constructor(opts: CredentialStoreOptions) {
    this.admin = opts.admin;
    this.bcryptRounds = opts.bcryptRounds ?? 10;
  }

  /** Returns null when nothing has been stored yet. */
  protected abstract read(): Map<string, UserRecord> | null;
  protected abstract write(users: ReadonlyMap<string, UserRecord>): void;

  load(): ReadonlyMap<string, UserRecord> {
    const stored = this.read();
    if (stored) {
      this.users = stored;
      this.loaded = true;
      return this.users;
    }

    const seeded = new Map<string, UserRecord>();
    seeded.set(this.admin.username, {
      username: this.admin.username,
      passwordHash: this.hash(this.admin.password),
      displayName: this.admin.displayName,
      role: 'admin',
    });
    this.users = seeded;
    this.loaded = true;
    this.persist();
    return this.users;
  }

  find(username: string): UserRecord | undefined {
    return this.ensureLoaded().get(username);
  }

  list(): UserRecord[] {
    return [...this.ensureLoaded().values()].sort((a, b) => a.username.localeCompare(b.username));
  }

  create(input: NewUser): UserRecord {
    const users = this.ensureLoaded();
    if (users.has(input.username)) throw new DuplicateUserError(input.username);

    const user: UserRecord = {
      username: input.username,
      passwordHash: this.hash(input.password),
      displayName: input.displayName,
      role: input.role,
    };
    users.set(user.username, user);
    try {
      this.persist();
    } catch (err) {
      users.delete(user.username);
      throw err;
    }
    return user;
  }

  persist(): void {
    this.write(this.users);
  }

  private ensureLoaded(): Map<string, UserRecord> {
    if (!this.loaded) this.load();
    return this.users;
  }

  private hash(password: string): string {
    return bcrypt.hashSync(password, this.bcryptRounds);
  }
}

export class MemoryCredentialStore extends MapCredentialStore {
  private snapshot: Map<string, UserRecord> | null;

  constructor(opts: CredentialStoreOptions & { initial?: UserRecord[] }) {
    super(opts);
    this.snapshot = opts.initial ? new Map(opts.initial.map((u) => [u.username, { ...u }])) : null;
  }

  protected read(): Map<string, UserRecord> | null {
    return this.snapshot ? new Map(this.snapshot) : null;
  }

  protected write(users: ReadonlyMap<string, UserRecord>): void {
    this.snapshot = new Map(users);
  }
}

export class JsonFileCredentialStore extends MapCredentialStore {
  readonly filePath: string;

  constructor(opts: CredentialStoreOptions & { filePath: string }) {
    super(opts);
    this.filePath = path.resolve(opts.filePath);
  }

  protected read(): Map<string, UserRecord> | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw new CredentialStoreError(`Could not read users file: ${errorMessage(err)}`, { cause: err });
    }

    let entries: Array<[string, StoredUser]>;
    try {
      const file = usersFileSchema.parse(JSON.parse(raw));
      entries = userEntriesSchema.parse(Object.entries(file.users));
    } catch (err) {
      throw new CredentialStoreError(`Users file is invalid: ${this.filePath}`, { cause: err });
    }

    const users = new Map<string, UserRecord>();
    for (const [username, u] of entries) {
      users.set(username, { username, passwordHash: u.passwordHash, displayName: u.displayName, role: u.role });
    }
    return users;
  }

  protected write(users: ReadonlyMap<string, UserRecord>): void {
    const stored: Array<[string, StoredUser]> = [...users.values()].map((u) => [
      u.username,
      { passwordHash: u.passwordHash, displayName: u.displayName, role: u.role },
    ]);
    const out = { version: 1, users: Object.fromEntries(stored) };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      ensureDir(path.dirname(this.filePath));
      fs.writeFileSync(tmp, `${JSON.stringify(out, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      throw new CredentialStoreError(`Could not save users file: ${errorMessage(err)}`, { cause: err });
    }
  }
}
