import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface ProcessSupervisor {
  isRunning(serviceName: string): Promise<boolean>;
  start(serviceName: string): Promise<void>;
  restart(serviceName: string): Promise<void>;
}

export type ExecFn = (file: string, args: string[], opts: { timeout: number }) => Promise<unknown>;

function exitCode(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'number' ? err.code : undefined;
}

export class SystemdSupervisor implements ProcessSupervisor {
  constructor(
    private readonly exec: ExecFn = execFileAsync,
    private readonly timeoutMs = 30_000
  ) {}

  async isRunning(serviceName: string): Promise<boolean> {
    try {
      await this.exec('systemctl', ['is-active', '--quiet', serviceName], { timeout: this.timeoutMs });
      return true;
    } catch (err) {
      // is-active exits non-zero for inactive, failed and unknown units.
      if (exitCode(err) !== undefined) return false;
      throw err;
    }
  }

  async start(serviceName: string): Promise<void> {
    await this.exec('systemctl', ['start', serviceName], { timeout: this.timeoutMs });
  }

  async restart(serviceName: string): Promise<void> {
    await this.exec('systemctl', ['restart', serviceName], { timeout: this.timeoutMs });
  }
}
