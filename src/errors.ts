/**
 * Errors raised by the bootstrap agent. Each carries a stable `code` that the
 * status route and the logs report verbatim.
 */
export class BootstrapError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The request never produced an HTTP response (refused, reset, timed out). */
export class TransportError extends BootstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VAULT_TRANSPORT', message, options);
  }
}

/** The server answered, but not with what the call expects. Never retried. */
export class VaultApiError extends BootstrapError {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super('VAULT_API', message, options);
    this.statusCode = statusCode;
  }
}

export class UnreachableError extends BootstrapError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('VAULT_UNREACHABLE', `Vault unreachable after ${attempts} attempts: ${detail}`, { cause });
    this.attempts = attempts;
  }
}

export class MissingKeysError extends BootstrapError {
  constructor() {
    super('UNSEAL_KEYS_MISSING', 'No unseal keys published in leader settings');
  }
}

export class MissingTokenError extends BootstrapError {
  constructor() {
    super('ROOT_TOKEN_MISSING', 'No root token supplied or published in leader settings');
  }
}

export class NotLeaderError extends BootstrapError {
  constructor(action: string) {
    super('NOT_LEADER', `Only the leader may ${action}`);
  }
}

export class InvalidCidrError extends BootstrapError {
  constructor(cidr: string) {
    super('INVALID_CIDR', `Not a valid CIDR: ${cidr}`);
  }
}

/**
 * Vault was initialized but its root token and unseal keys were not written
 * to leader settings. The keys exist nowhere else, so the cluster has lost
 * access until an operator wipes and re-initializes the storage backend.
 */
export class SecretsPersistenceError extends BootstrapError {
  readonly requiresOperator = true;

  constructor(cause: unknown) {
    super(
      'BOOTSTRAP_SECRETS_NOT_PERSISTED',
      'Vault initialized but bootstrap secrets could not be stored; operator intervention required',
      { cause }
    );
  }
}

/** Fastify maps `statusCode` on a thrown error to the reply status. */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message?: string) {
    super(message ?? code);
    this.statusCode = statusCode;
    this.code = code;
  }
}

export function errorCode(err: unknown): string {
  if (err instanceof BootstrapError || err instanceof HttpError) return err.code;
  return 'UNEXPECTED';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
