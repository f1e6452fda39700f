import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { SecretsPersistenceError, UnreachableError, errorCode, errorMessage } from './errors.js';
import type { BootstrapCoordinator, BootstrapState, DeferReason } from './vault/bootstrap.js';

export type PassRecord = {
  state: BootstrapState | 'unreachable' | 'failed';
  at: string;
  durationMs: number;
  deferred?: DeferReason;
  actions: string[];
  error?: { code: string; message: string };
  requiresOperator?: boolean;
};

export type ReconcileHandle = {
  runNow: () => Promise<PassRecord>;
  last: () => PassRecord | undefined;
  close: () => Promise<void>;
};

/**
 * Runs one pass and turns its outcome or failure into a record. Failures are
 * logged and left for the next pass; nothing is thrown.
 */
export async function runPass(coordinator: Pick<BootstrapCoordinator, 'prepare'>, log: Logger): Promise<PassRecord> {
  const started = Date.now();
  const at = new Date(started).toISOString();

  try {
    const outcome = await coordinator.prepare();
    return { ...outcome, at, durationMs: Date.now() - started };
  } catch (err) {
    const error = { code: errorCode(err), message: errorMessage(err) };
    const record: PassRecord = { state: 'failed', at, durationMs: Date.now() - started, actions: [], error };

    if (err instanceof UnreachableError) {
      log.warn({ attempts: err.attempts }, 'Vault unreachable; retrying next pass');
      return { ...record, state: 'unreachable' };
    }
    if (err instanceof SecretsPersistenceError) {
      // Already logged as fatal where it happened. Keep reporting it.
      return { ...record, requiresOperator: true };
    }
    log.error({ err }, 'Reconcile pass failed');
    return record;
  }
}

export function startReconcileLoop(
  config: Pick<AppConfig, 'NODE_ENV' | 'RECONCILE_INTERVAL_SECONDS'>,
  coordinator: Pick<BootstrapCoordinator, 'prepare'>,
  log: Logger
): ReconcileHandle {
  let lastRecord: PassRecord | undefined;
  let inFlight: Promise<PassRecord> | undefined;

  // Passes never overlap: a caller arriving mid-pass gets that pass's result.
  const runNow = (): Promise<PassRecord> => {
    if (!inFlight) {
      inFlight = runPass(coordinator, log)
        .then((record) => {
          lastRecord = record;
          return record;
        })
        .finally(() => {
          inFlight = undefined;
        });
    }
    return inFlight;
  };

  const last = (): PassRecord | undefined => lastRecord;

  // Passes are triggered explicitly in tests.
  if (config.NODE_ENV === 'test') {
    return { runNow, last, close: async () => undefined };
  }

  const intervalSeconds = Math.max(1, Math.floor(config.RECONCILE_INTERVAL_SECONDS));

  const initial = setTimeout(() => void runNow(), 2_000);
  const interval = setInterval(() => void runNow(), intervalSeconds * 1000);

  initial.unref();
  interval.unref();

  return {
    runNow,
    last,
    close: async () => {
      clearTimeout(initial);
      clearInterval(interval);
      await inFlight;
    }
  };
}
