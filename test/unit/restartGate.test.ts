import { describe, expect, it, vi } from 'vitest';
import { RestartGate, decideRestart, opportunisticRestart, type RestartDecision } from '../../src/vault/restart.js';
import { FakeSupervisor, silentLogger } from './_fakes.js';

type Row = [running: boolean, unsafe: boolean, initialized: boolean, sealed: boolean, expected: RestartDecision];

const NOT_RUNNING: RestartDecision = { safe: true, reason: 'not-running' };
const UNSAFE: RestartDecision = { safe: true, reason: 'unsafe-auto-unlock' };
const UNINITIALIZED: RestartDecision = { safe: true, reason: 'uninitialized' };
const SEALED: RestartDecision = { safe: true, reason: 'sealed' };
const UNSEALED: RestartDecision = { safe: false, reason: 'unsealed' };

const table: Row[] = [
  [false, false, false, false, NOT_RUNNING],
  [false, false, false, true, NOT_RUNNING],
  [false, false, true, false, NOT_RUNNING],
  [false, false, true, true, NOT_RUNNING],
  [false, true, false, false, NOT_RUNNING],
  [false, true, false, true, NOT_RUNNING],
  [false, true, true, false, NOT_RUNNING],
  [false, true, true, true, NOT_RUNNING],
  [true, true, false, false, UNSAFE],
  [true, true, false, true, UNSAFE],
  [true, true, true, false, UNSAFE],
  [true, true, true, true, UNSAFE],
  [true, false, false, false, UNINITIALIZED],
  [true, false, false, true, UNINITIALIZED],
  [true, false, true, true, SEALED],
  [true, false, true, false, UNSEALED]
];

describe('decideRestart', () => {
  it.each(table)('running=%s unsafe=%s initialized=%s sealed=%s', (running, unsafeAutoUnlock, initialized, sealed, expected) => {
    expect(decideRestart({ running, unsafeAutoUnlock, initialized, sealed })).toEqual(expected);
  });

  it('only refuses for a running, initialized, unsealed server without the unsafe flag', () => {
    const unsafeRows = table.filter((row) => !row[4].safe);
    expect(unsafeRows).toHaveLength(1);
    expect(unsafeRows[0]?.slice(0, 4)).toEqual([true, false, true, false]);
  });
});

function gateFor(opts: { running: boolean; unsafe?: boolean; initialized?: boolean; sealed?: boolean }) {
  const supervisor = new FakeSupervisor(opts.running);
  const api = {
    isInitialized: vi.fn(async () => opts.initialized ?? false),
    isSealed: vi.fn(async () => opts.sealed ?? true)
  };
  const gate = new RestartGate({
    supervisor,
    serviceName: 'vault',
    api,
    unsafeAutoUnlock: opts.unsafe ?? false,
    log: silentLogger()
  });
  return { gate, api, supervisor };
}

describe('RestartGate', () => {
  it('does not query the server when the process is stopped', async () => {
    const { gate, api } = gateFor({ running: false });

    await expect(gate.evaluate()).resolves.toEqual(NOT_RUNNING);
    expect(api.isInitialized).not.toHaveBeenCalled();
    expect(api.isSealed).not.toHaveBeenCalled();
  });

  it('does not query the server when unsafe auto unlock is set', async () => {
    const { gate, api } = gateFor({ running: true, unsafe: true, initialized: true, sealed: false });

    await expect(gate.canRestart()).resolves.toBe(true);
    expect(api.isInitialized).not.toHaveBeenCalled();
  });

  it('skips the seal query for an uninitialized server', async () => {
    const { gate, api } = gateFor({ running: true, initialized: false });

    await expect(gate.evaluate()).resolves.toEqual(UNINITIALIZED);
    expect(api.isSealed).not.toHaveBeenCalled();
  });

  it('allows a restart while sealed', async () => {
    const { gate } = gateFor({ running: true, initialized: true, sealed: true });
    await expect(gate.canRestart()).resolves.toBe(true);
  });

  it('refuses a restart while unsealed', async () => {
    const { gate } = gateFor({ running: true, initialized: true, sealed: false });
    await expect(gate.evaluate()).resolves.toEqual(UNSEALED);
  });
});

describe('opportunisticRestart', () => {
  it('restarts a sealed server', async () => {
    const { gate, supervisor } = gateFor({ running: true, initialized: true, sealed: true });

    const res = await opportunisticRestart(gate, supervisor, 'vault', silentLogger());

    expect(res).toEqual({ restarted: true });
    expect(supervisor.calls).toEqual(['restart:vault']);
  });

  it('only makes sure an unsealed server is running', async () => {
    const { gate, supervisor } = gateFor({ running: true, initialized: true, sealed: false });

    const res = await opportunisticRestart(gate, supervisor, 'vault', silentLogger());

    expect(res).toEqual({ restarted: false });
    expect(supervisor.calls).toEqual(['start:vault']);
  });
});
