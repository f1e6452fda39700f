import type { Logger } from 'pino';
import type { ProcessSupervisor } from '../system/supervisor.js';
import type { VaultApi } from './client.js';

export type RestartInputs = {
  running: boolean;
  unsafeAutoUnlock: boolean;
  initialized: boolean;
  sealed: boolean;
};

export type RestartReason = 'not-running' | 'unsafe-auto-unlock' | 'uninitialized' | 'sealed' | 'unsealed';

export type RestartDecision = {
  safe: boolean;
  reason: RestartReason;
};

/** First matching rule wins. */
export function decideRestart(inputs: RestartInputs): RestartDecision {
  if (!inputs.running) return { safe: true, reason: 'not-running' };
  if (inputs.unsafeAutoUnlock) return { safe: true, reason: 'unsafe-auto-unlock' };
  if (!inputs.initialized) return { safe: true, reason: 'uninitialized' };
  if (inputs.sealed) return { safe: true, reason: 'sealed' };
  // Initialized, unsealed and serving: a restart would need every unit re-unsealed.
  return { safe: false, reason: 'unsealed' };
}

export type RestartGateOptions = {
  supervisor: ProcessSupervisor;
  serviceName: string;
  api: Pick<VaultApi, 'isInitialized' | 'isSealed'>;
  unsafeAutoUnlock: boolean;
  log: Logger;
};

export class RestartGate {
  constructor(private readonly opts: RestartGateOptions) {}

  async evaluate(): Promise<RestartDecision> {
    const { supervisor, serviceName, api, unsafeAutoUnlock } = this.opts;

    // Only ask the server what the earlier rules leave undecided.
    const running = await supervisor.isRunning(serviceName);
    let decision: RestartDecision;
    if (!running || unsafeAutoUnlock) {
      decision = decideRestart({ running, unsafeAutoUnlock, initialized: false, sealed: false });
    } else {
      const initialized = await api.isInitialized();
      const sealed = initialized ? await api.isSealed() : false;
      decision = decideRestart({ running, unsafeAutoUnlock, initialized, sealed });
    }

    this.opts.log.debug({ reason: decision.reason }, `Safe to restart: ${decision.safe}`);
    return decision;
  }

  async canRestart(): Promise<boolean> {
    return (await this.evaluate()).safe;
  }
}

/** Restarts the service when that is safe, otherwise only makes sure it runs. */
export async function opportunisticRestart(
  gate: RestartGate,
  supervisor: ProcessSupervisor,
  serviceName: string,
  log: Logger
): Promise<{ restarted: boolean }> {
  if (await gate.canRestart()) {
    log.debug({ service: serviceName }, 'Restarting vault');
    await supervisor.restart(serviceName);
    return { restarted: true };
  }
  log.debug({ service: serviceName }, 'Starting vault');
  await supervisor.start(serviceName);
  return { restarted: false };
}
