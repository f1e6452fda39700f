import Fastify, { type FastifyError } from 'fastify';
import type { AppConfig } from './config.js';
import {
  BootstrapError,
  HttpError,
  MissingTokenError,
  NotLeaderError,
  UnreachableError,
  VaultApiError
} from './errors.js';
import { loggerOptions } from './logger.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerStatusRoutes } from './routes/status.js';
import type { Runtime } from './runtime.js';

const BAD_REQUEST_CODES = new Set(['INVALID_CIDR', 'INVALID_BACKEND', 'HOSTNAME_REQUIRED']);

function statusFor(err: FastifyError | Error): number {
  if (err instanceof HttpError) return err.statusCode;
  if ('validation' in err && err.validation) return 400;
  if (err instanceof UnreachableError) return 503;
  if (err instanceof MissingTokenError || err instanceof NotLeaderError) return 409;
  if (err instanceof VaultApiError) return 502;
  if (err instanceof BootstrapError && BAD_REQUEST_CODES.has(err.code)) return 400;
  return 500;
}

export async function buildApp(config: AppConfig, runtime: Runtime) {
  const app = Fastify({
    logger: config.NODE_ENV === 'test' ? false : loggerOptions(config)
  });

  app.setErrorHandler(async (err, request, reply) => {
    const status = statusFor(err);
    if (status >= 500) request.log.error({ err }, 'Request failed');

    reply.code(status);
    return {
      error: err instanceof BootstrapError || err instanceof HttpError ? err.code : status === 400 ? 'BAD_REQUEST' : 'INTERNAL',
      message: err.message
    };
  });

  await registerHealthRoutes(app, config);
  await registerStatusRoutes(app, runtime);
  await registerAdminRoutes(app, runtime);

  await app.ready();

  async function close(): Promise<void> {
    await runtime.reconcile.close();
    await app.close();
  }

  return { app, close };
}
