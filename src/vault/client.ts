import vault from 'node-vault';
import type { client as NodeVaultClient, VaultOptions } from 'node-vault';
import { request } from 'undici';
import { z } from 'zod';
import { TransportError, VaultApiError } from '../errors.js';

/** Field names are the server's wire contract for `/v1/sys/health`. */
export const serverHealthSchema = z
  .object({
    initialized: z.boolean(),
    sealed: z.boolean(),
    standby: z.boolean().optional(),
    version: z.string().optional(),
    cluster_name: z.string().optional()
  })
  .passthrough();

export type ServerHealth = z.infer<typeof serverHealthSchema>;

export type InitResult = {
  rootToken: string;
  keys: string[];
};

export type RoleSpec = {
  name: string;
  tokenTtl: string;
  tokenMaxTtl: string;
  policies: string[];
  boundCidr: string;
  bindSecretId: boolean;
};

/** Administrative API of the secrets server, as the bootstrap agent uses it. */
export interface VaultApi {
  health(): Promise<ServerHealth>;
  isInitialized(): Promise<boolean>;
  isSealed(): Promise<boolean>;
  initialize(shares: number, threshold: number): Promise<InitResult>;
  unseal(key: string): Promise<void>;
  /** Mount paths with their trailing slash, e.g. `approle/`. */
  listAuthBackends(): Promise<Set<string>>;
  enableAuthBackend(type: string): Promise<void>;
  setPolicy(name: string, document: string): Promise<void>;
  createRole(spec: RoleSpec): Promise<void>;
  getRoleId(name: string): Promise<string>;
  /** Mount paths with their trailing slash, e.g. `charm-foo/`. */
  listSecretBackends(): Promise<Set<string>>;
  enableSecretBackend(type: string, mountPoint: string, description: string): Promise<void>;
}

export type VaultClientOptions = {
  url: string;
  token?: string;
  timeoutMs: number;
};

/** Hands out a client for the given token, or an anonymous one. */
export type VaultConnector = (token?: string) => VaultApi;

const initResponseSchema = z.object({
  keys: z.array(z.string()),
  root_token: z.string()
});
const initializedSchema = z.object({ initialized: z.boolean() });
const sealStatusSchema = z.object({ sealed: z.boolean() });
const roleIdSchema = z.object({ data: z.object({ role_id: z.string().min(1) }) });
const mountTableSchema = z.record(z.unknown());

function mountPaths(response: unknown): Set<string> {
  // Newer servers repeat the table under `data`; older ones only return it at the top level.
  const table = mountTableSchema.parse(response);
  const source = mountTableSchema.safeParse(table.data);
  const entries = source.success ? source.data : table;
  return new Set(Object.keys(entries).filter((k) => k.endsWith('/')));
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const direct = 'statusCode' in err ? err.statusCode : undefined;
  if (typeof direct === 'number') return direct;
  const response = 'response' in err ? err.response : undefined;
  if (typeof response === 'object' && response !== null && 'statusCode' in response) {
    return typeof response.statusCode === 'number' ? response.statusCode : undefined;
  }
  return undefined;
}

/**
 * node-vault rejects with the server's error text for HTTP failures and with
 * the socket error otherwise; keep that split visible to callers.
 */
function translate(action: string, err: unknown): Error {
  if (err instanceof TransportError || err instanceof VaultApiError) return err;
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status !== undefined) return new VaultApiError(`${action}: ${message}`, status, { cause: err });
  return new TransportError(`${action}: ${message}`, { cause: err });
}

export class NodeVaultApi implements VaultApi {
  private readonly client: NodeVaultClient;

  constructor(private readonly options: VaultClientOptions) {
    const vaultOptions: VaultOptions = {
      apiVersion: 'v1',
      endpoint: options.url,
      requestOptions: { timeout: options.timeoutMs }
    };
    if (options.token) {
      vaultOptions.token = options.token;
    }
    this.client = vault(vaultOptions);
  }

  /**
   * Plain GET of the health endpoint. Uninitialized, sealed and standby
   * servers answer with 501/503/429 but still send the JSON document.
   */
  async health(): Promise<ServerHealth> {
    const url = `${this.options.url.replace(/\/$/, '')}/v1/sys/health`;

    let statusCode: number;
    let text: string;
    try {
      const res = await request(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (err) {
      throw new TransportError(`GET ${url}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new VaultApiError(`GET ${url}: response is not JSON`, statusCode);
    }

    const parsed = serverHealthSchema.safeParse(body);
    if (!parsed.success) {
      throw new VaultApiError(`GET ${url}: unexpected health document`, statusCode);
    }
    return parsed.data;
  }

  async isInitialized(): Promise<boolean> {
    const res = await this.call('read init status', () => this.client.initialized());
    return initializedSchema.parse(res).initialized;
  }

  async isSealed(): Promise<boolean> {
    const res = await this.call('read seal status', () => this.client.status());
    return sealStatusSchema.parse(res).sealed;
  }

  async initialize(shares: number, threshold: number): Promise<InitResult> {
    const res = await this.call('initialize', () =>
      this.client.init({ secret_shares: shares, secret_threshold: threshold })
    );
    const parsed = initResponseSchema.parse(res);
    return { rootToken: parsed.root_token, keys: parsed.keys };
  }

  async unseal(key: string): Promise<void> {
    await this.call('unseal', () => this.client.unseal({ key }));
  }

  async listAuthBackends(): Promise<Set<string>> {
    return mountPaths(await this.call('list auth backends', () => this.client.auths()));
  }

  async enableAuthBackend(type: string): Promise<void> {
    await this.call(`enable ${type} auth`, () => this.client.enableAuth({ mount_point: type, type }));
  }

  async setPolicy(name: string, document: string): Promise<void> {
    await this.call(`write policy ${name}`, () => this.client.addPolicy({ name, rules: document }));
  }

  async createRole(spec: RoleSpec): Promise<void> {
    await this.call(`write approle ${spec.name}`, () =>
      this.client.addApproleRole({
        role_name: spec.name,
        token_ttl: spec.tokenTtl,
        token_max_ttl: spec.tokenMaxTtl,
        policies: spec.policies.join(','),
        bind_secret_id: spec.bindSecretId ? 'true' : 'false',
        bound_cidr_list: spec.boundCidr
      })
    );
  }

  async getRoleId(name: string): Promise<string> {
    const res = await this.call(`read approle ${name} id`, () => this.client.getApproleRoleId({ role_name: name }));
    return roleIdSchema.parse(res).data.role_id;
  }

  async listSecretBackends(): Promise<Set<string>> {
    return mountPaths(await this.call('list secret backends', () => this.client.mounts()));
  }

  async enableSecretBackend(type: string, mountPoint: string, description: string): Promise<void> {
    await this.call(`mount ${type} at ${mountPoint}`, () =>
      this.client.mount({ mount_point: mountPoint, type, description })
    );
  }

  private async call(action: string, fn: () => Promise<unknown>): Promise<unknown> {
    try {
      return await fn();
    } catch (err) {
      throw translate(action, err);
    }
  }
}

export function createVaultConnector(options: Omit<VaultClientOptions, 'token'>): VaultConnector {
  return (token?: string) => new NodeVaultApi({ ...options, token });
}
