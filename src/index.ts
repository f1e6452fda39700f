import { loadConfig } from './config.js';
import { PgLeaderStore } from './cluster/store.js';
import { createDb } from './db.js';
import { createLogger } from './logger.js';
import { createRuntime } from './runtime.js';
import { SystemdSupervisor } from './system/supervisor.js';
import { createVaultConnector } from './vault/client.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);

  const db = createDb(config);
  await db.init();

  const runtime = createRuntime(config, log, {
    election: new PgLeaderStore(db, config),
    supervisor: new SystemdSupervisor(),
    connect: createVaultConnector({ url: config.VAULT_LOCAL_URL, timeoutMs: config.VAULT_REQUEST_TIMEOUT_MS })
  });

  const { app, close } = await buildApp(config, runtime);

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    close()
      .then(() => db.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  await app.listen({ host: config.HOST, port: config.PORT });
  log.info({ unit: config.UNIT_NAME, host: config.HOST, port: config.PORT }, 'vault-bootstrap listening');
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
