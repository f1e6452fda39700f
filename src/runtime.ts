import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { SharedStateStore } from './cluster/sharedState.js';
import type { LeaderElection } from './cluster/types.js';
import { startReconcileLoop, type ReconcileHandle } from './reconcile.js';
import {
  NetworkBinding,
  anyAddressStrategy,
  configuredAddressStrategy,
  privateAddressStrategy
} from './system/network.js';
import type { ProcessSupervisor } from './system/supervisor.js';
import { AccessProvisioner } from './vault/access.js';
import { BootstrapCoordinator } from './vault/bootstrap.js';
import type { VaultApi, VaultConnector } from './vault/client.js';
import { HealthProbe, type Sleep } from './vault/health.js';
import { RestartGate } from './vault/restart.js';
import type { UrlContext } from './vault/urls.js';

export type Runtime = {
  config: AppConfig;
  log: Logger;
  store: SharedStateStore;
  localApi: VaultApi;
  probe: HealthProbe;
  coordinator: BootstrapCoordinator;
  provisioner: AccessProvisioner;
  restartGate: RestartGate;
  supervisor: ProcessSupervisor;
  urls: UrlContext;
  reconcile: ReconcileHandle;
};

export type RuntimeDeps = {
  election: LeaderElection;
  supervisor: ProcessSupervisor;
  /** Clients against the loopback listener. */
  connect: VaultConnector;
  network?: NetworkBinding;
  sleep?: Sleep;
};

export function createRuntime(config: AppConfig, log: Logger, deps: RuntimeDeps): Runtime {
  const store = new SharedStateStore(deps.election);
  const localApi = deps.connect();

  const probe = new HealthProbe(
    localApi,
    {
      maxAttempts: config.HEALTH_RETRY_ATTEMPTS,
      baseDelayMs: config.HEALTH_RETRY_BASE_MS,
      maxDelayMs: config.HEALTH_RETRY_MAX_MS
    },
    log.child({ component: 'health' }),
    deps.sleep
  );

  const provisioner = new AccessProvisioner(deps.connect, store, log.child({ component: 'access' }));

  const coordinator = new BootstrapCoordinator({
    serviceName: config.VAULT_SERVICE_NAME,
    shares: config.VAULT_INIT_SHARES,
    threshold: config.VAULT_INIT_THRESHOLD,
    supervisor: deps.supervisor,
    probe,
    api: localApi,
    store,
    provisioner,
    log: log.child({ component: 'bootstrap' })
  });

  const restartGate = new RestartGate({
    supervisor: deps.supervisor,
    serviceName: config.VAULT_SERVICE_NAME,
    api: localApi,
    unsafeAutoUnlock: config.TOTALLY_UNSECURE_AUTO_UNLOCK,
    log: log.child({ component: 'restart' })
  });

  const network =
    deps.network ??
    new NetworkBinding(
      [
        configuredAddressStrategy({ access: config.BINDING_ADDRESS_ACCESS, cluster: config.BINDING_ADDRESS_CLUSTER }),
        privateAddressStrategy(),
        anyAddressStrategy()
      ],
      log.child({ component: 'network' })
    );

  const urls: UrlContext = {
    network,
    tlsEnabled: config.VAULT_TLS_ENABLED,
    apiPort: config.VAULT_API_PORT,
    clusterPort: config.VAULT_CLUSTER_PORT
  };

  const reconcile = startReconcileLoop(config, coordinator, log.child({ component: 'reconcile' }));

  return {
    config,
    log,
    store,
    localApi,
    probe,
    coordinator,
    provisioner,
    restartGate,
    supervisor: deps.supervisor,
    urls,
    reconcile
  };
}
