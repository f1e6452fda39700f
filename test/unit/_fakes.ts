import { pino } from 'pino';
import type { Logger } from 'pino';
import type { LeaderElection } from '../../src/cluster/types.js';
import { NotLeaderError, VaultApiError } from '../../src/errors.js';
import type { ProcessSupervisor } from '../../src/system/supervisor.js';
import type { InitResult, RoleSpec, ServerHealth, VaultApi } from '../../src/vault/client.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type VaultCall =
  | { op: 'health' }
  | { op: 'initialize'; shares: number; threshold: number }
  | { op: 'unseal'; key: string }
  | { op: 'enableAuthBackend'; type: string }
  | { op: 'setPolicy'; name: string }
  | { op: 'createRole'; name: string }
  | { op: 'enableSecretBackend'; mountPoint: string };

/**
 * In-memory secrets server. Keys are generated on initialize; the server
 * unseals once `threshold` distinct valid keys have been submitted.
 */
export class FakeVault {
  initialized = false;
  sealed = true;
  rootToken = '';
  keys: string[] = [];
  threshold = 0;
  private progress = new Set<string>();

  readonly authBackends = new Set<string>(['token/']);
  readonly secretBackends = new Set<string>(['secret/', 'sys/', 'cubbyhole/']);
  readonly policies = new Map<string, string>();
  readonly roles = new Map<string, RoleSpec>();
  readonly calls: VaultCall[] = [];
  /** Tokens the admin calls were made with, in call order. */
  readonly tokensSeen: Array<string | undefined> = [];

  count(op: VaultCall['op']): number {
    return this.calls.filter((c) => c.op === op).length;
  }

  client(token?: string): VaultApi {
    const admin = (): void => {
      this.tokensSeen.push(token);
      if (!token || token !== this.rootToken) throw new VaultApiError('permission denied', 403);
      if (this.sealed) throw new VaultApiError('Vault is sealed', 503);
    };

    return {
      health: async (): Promise<ServerHealth> => {
        this.calls.push({ op: 'health' });
        return { initialized: this.initialized, sealed: this.sealed, standby: false };
      },
      isInitialized: async () => this.initialized,
      isSealed: async () => this.sealed,
      initialize: async (shares: number, threshold: number): Promise<InitResult> => {
        this.calls.push({ op: 'initialize', shares, threshold });
        if (this.initialized) throw new VaultApiError('Vault is already initialized', 400);
        this.initialized = true;
        this.sealed = true;
        this.threshold = threshold;
        this.rootToken = 'test-root-token';
        this.keys = Array.from({ length: shares }, (_, i) => `test-unseal-key-${i + 1}`);
        return { rootToken: this.rootToken, keys: [...this.keys] };
      },
      unseal: async (key: string) => {
        this.calls.push({ op: 'unseal', key });
        if (!this.initialized) throw new VaultApiError('Vault is not initialized', 400);
        if (!this.sealed) return;
        if (!this.keys.includes(key)) throw new VaultApiError('invalid key', 400);
        this.progress.add(key);
        if (this.progress.size >= this.threshold) {
          this.sealed = false;
          this.progress.clear();
        }
      },
      listAuthBackends: async () => {
        admin();
        return new Set(this.authBackends);
      },
      enableAuthBackend: async (type: string) => {
        admin();
        this.calls.push({ op: 'enableAuthBackend', type });
        if (this.authBackends.has(`${type}/`)) throw new VaultApiError('path is already in use', 400);
        this.authBackends.add(`${type}/`);
      },
      setPolicy: async (name: string, document: string) => {
        admin();
        this.calls.push({ op: 'setPolicy', name });
        this.policies.set(name, document);
      },
      createRole: async (spec: RoleSpec) => {
        admin();
        this.calls.push({ op: 'createRole', name: spec.name });
        this.roles.set(spec.name, { ...spec, policies: [...spec.policies] });
      },
      getRoleId: async (name: string) => {
        admin();
        if (!this.roles.has(name)) throw new VaultApiError(`role ${name} not found`, 404);
        return `role-id-${name}`;
      },
      listSecretBackends: async () => {
        admin();
        return new Set(this.secretBackends);
      },
      enableSecretBackend: async (type: string, mountPoint: string) => {
        admin();
        this.calls.push({ op: 'enableSecretBackend', mountPoint });
        if (type !== 'kv') throw new VaultApiError(`unknown backend type ${type}`, 400);
        if (this.secretBackends.has(`${mountPoint}/`)) throw new VaultApiError('path is already in use', 400);
        this.secretBackends.add(`${mountPoint}/`);
      }
    };
  }

  /** Simulates a process restart: storage survives, the server comes back sealed. */
  restart(): void {
    this.sealed = true;
    this.progress.clear();
  }
}

/** Leader settings held in memory; rejects writes from followers. */
export class MemoryElection implements LeaderElection {
  leader: boolean;
  readonly data = new Map<string, string>();
  readonly writes: string[] = [];

  constructor(leader = true, initial: Record<string, string> = {}) {
    this.leader = leader;
    for (const [k, v] of Object.entries(initial)) this.data.set(k, v);
  }

  async isLeader(): Promise<boolean> {
    return this.leader;
  }

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.setMany({ [key]: value });
  }

  async setMany(values: Record<string, string>): Promise<void> {
    if (!this.leader) throw new NotLeaderError('write leader settings');
    for (const [k, v] of Object.entries(values)) {
      this.data.set(k, v);
      this.writes.push(k);
    }
  }
}

export class FakeSupervisor implements ProcessSupervisor {
  readonly calls: string[] = [];

  constructor(public running = true) {}

  async isRunning(): Promise<boolean> {
    return this.running;
  }

  async start(serviceName: string): Promise<void> {
    this.calls.push(`start:${serviceName}`);
    this.running = true;
  }

  async restart(serviceName: string): Promise<void> {
    this.calls.push(`restart:${serviceName}`);
    this.running = true;
  }
}
