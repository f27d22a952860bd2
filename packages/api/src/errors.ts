export class DuplicateUserError extends Error {
  readonly username: string;
  constructor(username: string) {
    super(`User already exists: ${username}`);
    this.name = 'DuplicateUserError';
    this.username = username;
  }
}

export class CredentialStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialStoreError';
  }
}

export class PromptInputError extends Error {
  readonly field: string;
  constructor(field: string, message: string) {
    super(message);
    this.name = 'PromptInputError';
    this.field = field;
  }
}

export class GenerationFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationFailedError';
  }
}
