import { setTimeout as sleepMs } from 'node:timers/promises';
import type { Logger } from 'pino';
import { TransportError, UnreachableError } from '../errors.js';
import type { ServerHealth, VaultApi } from './client.js';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_HEALTH_RETRY: RetryPolicy = {
  maxAttempts: 10,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000
};

export type Sleep = (ms: number) => Promise<unknown>;

/** Delay before the attempt after `attempt` (1-based): base, 2·base, 4·base… capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `fn` until it succeeds, retrying only transport failures. Any other
 * error, including a well-formed error response, propagates immediately.
 */
export async function retryTransport<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  opts: { sleep?: Sleep; onRetry?: (attempt: number, delayMs: number, err: TransportError) => void } = {}
): Promise<T> {
  const sleep = opts.sleep ?? sleepMs;
  let lastError: TransportError | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const delayMs = backoffDelay(policy, attempt);
      opts.onRetry?.(attempt, delayMs, err);
      await sleep(delayMs);
    }
  }

  throw new UnreachableError(policy.maxAttempts, lastError);
}

export type HealthState = 'uninitialized' | 'sealed' | 'unsealed';

export function classifyHealth(health: Pick<ServerHealth, 'initialized' | 'sealed'>): HealthState {
  if (!health.initialized) return 'uninitialized';
  return health.sealed ? 'sealed' : 'unsealed';
}

export class HealthProbe {
  constructor(
    private readonly api: Pick<VaultApi, 'health'>,
    private readonly policy: RetryPolicy,
    private readonly log: Logger,
    private readonly sleep: Sleep = sleepMs
  ) {}

  /** Throws UnreachableError once the retry budget is spent. */
  async probe(): Promise<ServerHealth> {
    const health = await retryTransport(() => this.api.health(), this.policy, {
      sleep: this.sleep,
      onRetry: (attempt, delayMs, err) => {
        this.log.debug({ attempt, delayMs, err: err.message }, 'Vault health check failed, retrying');
      }
    });
    this.log.debug(
      { initialized: health.initialized, sealed: health.sealed, state: classifyHealth(health) },
      'Vault health'
    );
    return health;
  }
}
