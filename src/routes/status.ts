import type { FastifyInstance } from 'fastify';
import { requireAdmin } from '../auth.js';
import { errorCode, errorMessage } from '../errors.js';
import type { Runtime } from '../runtime.js';
import { classifyHealth } from '../vault/health.js';
import { getApiUrl, getClusterUrl } from '../vault/urls.js';

type Attempt<T> = { ok: true; value: T } | { ok: false; error: { code: string; message: string } };

function failed(err: unknown): { ok: false; error: { code: string; message: string } } {
  return { ok: false, error: { code: errorCode(err), message: errorMessage(err) } };
}

function attempt<T>(fn: () => T): Attempt<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    return failed(err);
  }
}

async function attemptAsync<T>(fn: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return failed(err);
  }
}

export async function registerStatusRoutes(app: FastifyInstance, runtime: Runtime): Promise<void> {
  const { config, store, localApi, restartGate, supervisor, urls, reconcile } = runtime;

  app.get('/api/status', async (request, reply) => {
    requireAdmin(config, request);

    const [leader, running, roleId] = await Promise.all([
      store.isLeader(),
      supervisor.isRunning(config.VAULT_SERVICE_NAME),
      attemptAsync(() => store.getLocalAccessRoleId())
    ]);

    // One unretried probe: status must answer even while the server is down.
    let server: Record<string, unknown> = { reachable: false };
    if (running) {
      try {
        const health = await localApi.health();
        server = { reachable: true, state: classifyHealth(health), ...health };
      } catch (err) {
        server = { reachable: false, error: { code: errorCode(err), message: errorMessage(err) } };
      }
    }

    const restart = await attemptAsync(() => restartGate.evaluate());
    const apiUrl = attempt(() => getApiUrl(urls));
    const clusterUrl = attempt(() => getClusterUrl(urls));

    reply.header('cache-control', 'no-store');
    return {
      unit: config.UNIT_NAME,
      role: leader ? 'leader' : 'follower',
      service: { name: config.VAULT_SERVICE_NAME, running },
      server,
      localAccessRolePublished: roleId.ok ? Boolean(roleId.value) : { error: roleId.error },
      restart: restart.ok ? restart.value : { error: restart.error },
      urls: {
        local: config.VAULT_LOCAL_URL,
        api: apiUrl.ok ? apiUrl.value : null,
        cluster: clusterUrl.ok ? clusterUrl.value : null
      },
      lastPass: reconcile.last() ?? null
    };
  });
}
