import type { Logger } from 'pino';
import type { SharedStateStore } from '../cluster/sharedState.js';
import type { BootstrapSecrets } from '../cluster/types.js';
import { MissingKeysError, NotLeaderError, SecretsPersistenceError } from '../errors.js';
import type { ProcessSupervisor } from '../system/supervisor.js';
import type { AccessProvisioner } from './access.js';
import type { VaultApi } from './client.js';
import type { HealthProbe } from './health.js';

export type BootstrapState = 'not-running' | 'uninitialized' | 'sealed' | 'unprovisioned' | 'ready';

export type DeferReason =
  | 'not-running'
  | 'awaiting-initialization'
  | 'unseal-keys-missing'
  | 'unseal-threshold-not-met'
  | 'awaiting-provisioning';

export type PassOutcome = {
  state: BootstrapState;
  deferred?: DeferReason;
  /** Mutations this pass made, in order. */
  actions: string[];
};

export type BootstrapCoordinatorOptions = {
  serviceName: string;
  shares: number;
  threshold: number;
  supervisor: ProcessSupervisor;
  probe: HealthProbe;
  /** Anonymous client on the local listener; initialize and unseal need no token. */
  api: VaultApi;
  store: SharedStateStore;
  provisioner: AccessProvisioner;
  log: Logger;
};

/**
 * Drives the local server from uninitialized to unsealed with the local
 * access role in place. One call to `prepare()` is one reconciliation pass;
 * every step re-derives its input, so passes can be repeated or interrupted.
 */
export class BootstrapCoordinator {
  constructor(private readonly opts: BootstrapCoordinatorOptions) {}

  async prepare(): Promise<PassOutcome> {
    const { supervisor, serviceName, probe, store, log } = this.opts;
    const actions: string[] = [];

    if (!(await supervisor.isRunning(serviceName))) {
      log.info({ service: serviceName }, 'Deferring unlock: vault not running, waiting for it to be started');
      return { state: 'not-running', deferred: 'not-running', actions };
    }

    // UnreachableError propagates: the scheduler retries on the next pass.
    const health = await probe.probe();
    let sealed = health.sealed;

    if (!health.initialized) {
      if (!(await store.isLeader())) {
        log.info('Deferring unlock: vault not initialized, waiting for the leader');
        return { state: 'uninitialized', deferred: 'awaiting-initialization', actions };
      }
      await this.initialize();
      actions.push('initialize');
      sealed = true;
    }

    if (sealed) {
      try {
        const submitted = await this.unseal();
        actions.push(`unseal:${submitted}`);
      } catch (err) {
        if (!(err instanceof MissingKeysError)) throw err;
        log.info('Deferring unlock: unseal keys not published yet');
        return { state: 'sealed', deferred: 'unseal-keys-missing', actions };
      }

      if (await this.opts.api.isSealed()) {
        log.warn('Vault still sealed after submitting every published key');
        return { state: 'sealed', deferred: 'unseal-threshold-not-met', actions };
      }
    }

    if (!(await store.isLeader())) {
      const roleId = await store.getLocalAccessRoleId();
      if (!roleId) {
        log.info('Vault unsealed; waiting for the leader to provision local access');
        return { state: 'unprovisioned', deferred: 'awaiting-provisioning', actions };
      }
      log.debug('Vault ready');
      return { state: 'ready', actions };
    }

    const roleId = await this.opts.provisioner.setupLocalAccess();
    actions.push('provision');
    if ((await store.getLocalAccessRoleId()) !== roleId) {
      await store.putLocalAccessRoleId(roleId);
      actions.push('publish-role-id');
    }

    log.info({ actions }, 'Vault ready');
    return { state: 'ready', actions };
  }

  /**
   * Initializes the server and stores the root token and unseal keys in
   * leader settings before returning. Callers gate this on the health
   * document's `initialized` flag; a second call against the same server is
   * rejected by the server itself.
   */
  async initialize(shares = this.opts.shares, threshold = this.opts.threshold): Promise<BootstrapSecrets> {
    const { api, store, log } = this.opts;
    if (!(await store.isLeader())) throw new NotLeaderError('initialize vault');

    log.info({ shares, threshold }, 'Initializing vault');
    const result = await api.initialize(shares, threshold);
    const secrets: BootstrapSecrets = { rootToken: result.rootToken, unsealKeys: result.keys, shares, threshold };

    try {
      await store.putBootstrapSecrets(secrets);
    } catch (err) {
      const failure = new SecretsPersistenceError(err);
      log.fatal({ code: failure.code, err }, failure.message);
      throw failure;
    }

    log.info('Vault initialized; root token and unseal keys stored in leader settings');
    return secrets;
  }

  /**
   * Submits every key in order; the server decides when its threshold is
   * met. Returns how many keys were submitted.
   */
  async unseal(keys?: string[]): Promise<number> {
    const { api, store, log } = this.opts;
    const toSubmit = keys && keys.length > 0 ? keys : await store.getUnsealKeys();

    for (const key of toSubmit) {
      await api.unseal(key);
    }
    log.info({ keys: toSubmit.length }, 'Submitted unseal keys');
    return toSubmit.length;
  }
}
