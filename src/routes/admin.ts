import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { requireAdmin } from '../auth.js';
import type { Runtime } from '../runtime.js';
import type { SecretBackendGrant } from '../vault/access.js';
import { opportunisticRestart } from '../vault/restart.js';

export async function registerAdminRoutes(app: FastifyInstance, runtime: Runtime): Promise<void> {
  const { config, reconcile, restartGate, supervisor, store, provisioner, log } = runtime;

  app.post('/api/reconcile', async (request) => {
    requireAdmin(config, request);
    return reconcile.runNow();
  });

  app.post('/api/restart', async (request) => {
    requireAdmin(config, request);
    return opportunisticRestart(restartGate, supervisor, config.VAULT_SERVICE_NAME, log);
  });

  app.post(
    '/api/kv-access',
    {
      schema: {
        body: {
          type: 'object',
          required: ['backend', 'cidr'],
          additionalProperties: false,
          properties: {
            backend: { type: 'string', minLength: 1, maxLength: 128, pattern: '^[a-z0-9][a-z0-9-]*$' },
            hostname: { type: 'string', minLength: 1, maxLength: 253, pattern: '^[A-Za-z0-9][A-Za-z0-9.-]*$' },
            cidr: { type: 'string', minLength: 1, maxLength: 64 },
            isolated: { type: 'boolean', default: true }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: SecretBackendGrant }>, reply: FastifyReply) => {
      requireAdmin(config, request);

      if (!(await store.isLeader())) {
        reply.code(409);
        return {
          error: 'FOLLOWER_READONLY',
          message: 'This unit is a follower. Grant access on the leader.'
        };
      }

      return provisioner.grantSecretBackendAccess(request.body);
    }
  );
}
