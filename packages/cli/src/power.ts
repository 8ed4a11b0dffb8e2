/**
 * CPU frequency governor switching.
 *
 * Low-power mode writes `powersave` to every cpufreq governor, leaving it
 * writes `ondemand`. The files are root-owned, so the write goes through
 * `sudo -n tee`. Machines without cpufreq simply have nothing to switch.
 */
import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import type { PowerManager } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';
import { type CommandRunner, runCommand } from './command.js';

const log = createLogger('power');

export const POWERSAVE_GOVERNOR = 'powersave';
export const DEFAULT_GOVERNOR = 'ondemand';

export interface GovernorPowerOptions {
  cpuDir?: string;
  run?: CommandRunner;
}

export class CpuGovernorPower implements PowerManager {
  private readonly cpuDir: string;
  private readonly run: CommandRunner;

  constructor(opts: GovernorPowerOptions = {}) {
    this.cpuDir = opts.cpuDir ?? '/sys/devices/system/cpu';
    this.run = opts.run ?? runCommand;
  }

  governorFiles(): string[] {
    if (!existsSync(this.cpuDir)) return [];
    return readdirSync(this.cpuDir)
      .filter(entry => /^cpu\d+$/.test(entry))
      .sort((a, b) => Number(a.slice(3)) - Number(b.slice(3)))
      .map(cpu => join(this.cpuDir, cpu, 'cpufreq', 'scaling_governor'))
      .filter(file => existsSync(file));
  }

  async setPowerSaving(saving: boolean): Promise<void> {
    const files = this.governorFiles();
    if (files.length === 0) {
      log.debug('No cpufreq governors found; nothing to switch');
      return;
    }
    const governor = saving ? POWERSAVE_GOVERNOR : DEFAULT_GOVERNOR;
    await this.run('sudo', ['-n', 'tee', ...files], `${governor}\n`);
    log.debug(`Set ${files.length} CPU governor(s) to ${governor}`);
  }
}
