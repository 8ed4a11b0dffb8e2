import type { Heartbeat } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';
import { type CommandRunner, runCommand } from './command.js';

const log = createLogger('notify');

export interface Notifier extends Heartbeat {
  ready(): void;
  stopping(): void;
}

export interface SystemdNotifierOptions {
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
  pid?: number;
}

/**
 * Service manager notifications through `systemd-notify`. Inactive unless
 * the process was started with `NOTIFY_SOCKET`.
 */
export class SystemdNotifier implements Notifier {
  private readonly run: CommandRunner;
  private readonly pid: number;
  readonly enabled: boolean;

  constructor(opts: SystemdNotifierOptions = {}) {
    const env = opts.env ?? process.env;
    this.enabled = Boolean(env.NOTIFY_SOCKET);
    this.run = opts.run ?? runCommand;
    this.pid = opts.pid ?? process.pid;
  }

  ready(): void {
    this.send('READY=1');
  }

  alive(): void {
    this.send('WATCHDOG=1');
  }

  stopping(): void {
    this.send('STOPPING=1');
  }

  private send(state: string): void {
    if (!this.enabled) return;
    void this.run('systemd-notify', [`--pid=${this.pid}`, state]).catch((err: unknown) => {
      log.warn(`systemd-notify ${state} failed:`, err instanceof Error ? err.message : err);
    });
  }
}
