import ipaddr from 'ipaddr.js';
import type { Logger } from 'pino';
import type { SharedStateStore } from '../cluster/sharedState.js';
import { BootstrapError, InvalidCidrError } from '../errors.js';
import type { RoleSpec, VaultApi, VaultConnector } from './client.js';
import {
  CHARM_ACCESS_ROLE,
  CHARM_POLICY,
  CHARM_POLICY_NAME,
  CHARM_PREFIX,
  renderSecretBackendPolicy,
  renderSharedSecretBackendPolicy
} from './policies.js';

const ROLE_TOKEN_TTL = '60s';
const LOCAL_ONLY_CIDR = '127.0.0.1/32';

function roleSpec(name: string, cidr: string, policies: string[]): RoleSpec {
  // Roles authenticate by network origin, not by a shared secret id.
  return { name, tokenTtl: ROLE_TOKEN_TTL, tokenMaxTtl: ROLE_TOKEN_TTL, policies, boundCidr: cidr, bindSecretId: false };
}

export function assertCidr(cidr: string): void {
  try {
    ipaddr.parseCIDR(cidr);
  } catch {
    throw new InvalidCidrError(cidr);
  }
}

export async function enableApproleAuth(client: VaultApi): Promise<boolean> {
  if ((await client.listAuthBackends()).has('approle/')) return false;
  await client.enableAuthBackend('approle');
  return true;
}

/** Creates a KV mount at `name` unless one is already listed. */
export async function configureSecretBackend(client: VaultApi, name: string): Promise<boolean> {
  if ((await client.listSecretBackends()).has(`${name}/`)) return false;
  await client.enableSecretBackend('kv', name, 'Charm created KV backend');
  return true;
}

export async function configurePolicy(client: VaultApi, name: string, document: string): Promise<void> {
  await client.setPolicy(name, document);
}

/** Upserts an approle bound to `cidr` and returns its role id. */
export async function configureApprole(
  client: VaultApi,
  name: string,
  cidr: string,
  policies: string[]
): Promise<string> {
  assertCidr(cidr);
  await client.createRole(roleSpec(name, cidr, policies));
  return client.getRoleId(name);
}

export type SecretBackendGrant = {
  backend: string;
  /** Unit hostname; required for isolated access. */
  hostname?: string;
  cidr: string;
  /** `backend/hostname/*` when true, `backend/*` when false. */
  isolated: boolean;
};

export type SecretBackendGrantResult = {
  backend: string;
  policyName: string;
  roleName: string;
  roleId: string;
};

export class AccessProvisioner {
  constructor(
    private readonly connect: VaultConnector,
    private readonly store: SharedStateStore,
    private readonly log: Logger
  ) {}

  /**
   * Ensures approle auth, the local charm policy and the local access role,
   * then returns the role's id. Every step is safe to repeat.
   */
  async setupLocalAccess(token?: string): Promise<string> {
    const client = await this.adminClient(token);

    if (await enableApproleAuth(client)) {
      this.log.info('Enabled approle auth backend');
    }
    await configurePolicy(client, CHARM_POLICY_NAME, CHARM_POLICY);

    await client.createRole(roleSpec(CHARM_ACCESS_ROLE, LOCAL_ONLY_CIDR, [CHARM_POLICY_NAME]));
    const roleId = await client.getRoleId(CHARM_ACCESS_ROLE);
    this.log.info({ role: CHARM_ACCESS_ROLE }, 'Local charm access role ready');
    return roleId;
  }

  /**
   * Gives another unit access to a KV backend: mount, policy and an approle
   * bound to the unit's address.
   */
  async grantSecretBackendAccess(grant: SecretBackendGrant, token?: string): Promise<SecretBackendGrantResult> {
    if (!grant.backend.startsWith(CHARM_PREFIX)) {
      throw new BootstrapError('INVALID_BACKEND', `Backend name must start with ${CHARM_PREFIX}`);
    }
    if (grant.isolated && !grant.hostname) {
      throw new BootstrapError('HOSTNAME_REQUIRED', 'Isolated access needs the unit hostname');
    }
    assertCidr(grant.cidr);

    const client = await this.adminClient(token);

    if (await configureSecretBackend(client, grant.backend)) {
      this.log.info({ backend: grant.backend }, 'Mounted KV secret backend');
    }

    let policyName: string;
    let document: string;
    if (grant.isolated && grant.hostname) {
      policyName = `${grant.backend}-${grant.hostname}`;
      document = renderSecretBackendPolicy(grant.backend, grant.hostname);
    } else {
      policyName = grant.backend;
      document = renderSharedSecretBackendPolicy(grant.backend);
    }
    await configurePolicy(client, policyName, document);

    const roleName = grant.hostname ? `${grant.backend}-${grant.hostname}` : grant.backend;
    const roleId = await configureApprole(client, roleName, grant.cidr, [policyName]);
    this.log.info({ backend: grant.backend, policy: policyName, role: roleName }, 'Granted secret backend access');

    return { backend: grant.backend, policyName, roleName, roleId };
  }

  private async adminClient(token?: string): Promise<VaultApi> {
    return this.connect(token || (await this.store.getRootToken()));
  }
}
