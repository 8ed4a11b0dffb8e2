/**
 * The processing loop.
 *
 * Drains the recorder's queue, runs the session timeout check and liveness
 * ping on a fixed cadence, and sleeps between passes: briefly while active,
 * for `idleCheckInterval` while in low-power mode. New input wakes a sleeping
 * loop early.
 */
import { createLogger } from '../util/logger.js';
import { monotonicClock } from '../capture/clock.js';
import type { Clock, Heartbeat } from '../capture/types.js';
import type { Recorder } from './recorder.js';
import type { SessionSummary } from './sessionWriter.js';

const log = createLogger('loop');

export interface ControlLoopOptions {
  clock?: Clock;
  heartbeat?: Heartbeat;
  /**
   * Replaces the built-in timer sleep (seconds). Injected by tests to run the
   * loop against a manual clock.
   */
  sleep?: (seconds: number) => Promise<void>;
}

export class ControlLoop {
  private readonly clock: Clock;
  private running = false;
  private finished: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wakeSleeper: (() => void) | null = null;
  private iterations = 0;

  constructor(readonly recorder: Recorder, private readonly opts: ControlLoopOptions = {}) {
    this.clock = opts.clock ?? monotonicClock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Completed passes, for diagnostics. */
  get passes(): number {
    return this.iterations;
  }

  /** Start the loop; resolves when {@link stop} has been called and the loop exited. */
  start(): Promise<void> {
    if (this.finished) return this.finished;
    this.running = true;
    // Deferred so `finished` is set before the first pass can call back into stop()
    this.finished = Promise.resolve().then(() => this.run());
    return this.finished;
  }

  /**
   * Stop the loop, then close and save the open session.
   */
  async stop(): Promise<SessionSummary | undefined> {
    this.running = false;
    this.wake();
    if (this.finished) await this.finished;
    this.finished = null;
    return this.recorder.shutdown();
  }

  /** Cut the current sleep short. */
  wake(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const resolve = this.wakeSleeper;
    this.wakeSleeper = null;
    resolve?.();
  }

  private async run(): Promise<void> {
    const { config } = this.recorder;
    const unsubscribe = this.recorder.queue.onPush(() => {
      if (this.recorder.inLowPower) this.wake();
    });
    let lastCheck = this.clock.now();
    log.info('Control loop started');

    try {
      while (this.running) {
        try {
          this.recorder.processPending();

          const now = this.clock.now();
          if (now - lastCheck >= config.checkInterval) {
            this.recorder.checkTimeout();
            this.opts.heartbeat?.alive();
            lastCheck = now;
          }
          this.iterations++;

          await this.pause(this.recorder.inLowPower ? config.idleCheckInterval : config.activeSleep);
        } catch (err) {
          log.error('Error in control loop:', err);
          await this.pause(config.errorBackoff);
        }
      }
    } finally {
      unsubscribe();
      log.info('Control loop stopped');
    }
  }

  private pause(seconds: number): Promise<void> {
    if (!this.running) return Promise.resolve();
    if (this.opts.sleep) return this.opts.sleep(seconds);
    return new Promise<void>(resolve => {
      this.wakeSleeper = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wakeSleeper = null;
        resolve();
      }, seconds * 1000);
    });
  }
}
