/**
 * Poll loop driver: idle -> running -> idle, with halted as the terminal state.
 *
 * Cycles never overlap. With a fixed interval the next tick is scheduled only once the
 * current cycle has finished; with a cron schedule, ticks that fire mid-cycle are skipped.
 * stop() lets an in-flight cycle finish rather than abandoning its API calls.
 * Other CRM work (webhooks) goes through exclusive(), which shares one serial lane with cycles.
 */
import cron, { type ScheduledTask } from 'node-cron';
import {
  createLogger,
  errorMessage,
  isFatal,
  type CycleSummary,
  type Logger,
} from '@commission-sync/shared';

export type LoopState = 'idle' | 'running' | 'halted';

export type LoopExit = { reason: 'stopped' } | { reason: 'fatal'; error: unknown };

export interface PollLoopOptions {
  runCycle: () => Promise<CycleSummary>;
  intervalMs: number;
  /** Cron expression; replaces the interval as the tick source when set. */
  cron?: string;
  log?: Logger;
}

export class PollLoop {
  private _state: LoopState = 'idle';
  private _lastCycle: CycleSummary | null = null;
  private _lastError: string | null = null;
  private _cycles = 0;
  private started = false;
  private stopping = false;
  private timer: NodeJS.Timeout | null = null;
  private task: ScheduledTask | null = null;
  private lane: Promise<void> = Promise.resolve();
  private settle: (exit: LoopExit) => void = () => undefined;
  private readonly log: Logger;

  /** Resolves once the loop is halted, by stop() or by a fatal error. */
  readonly done: Promise<LoopExit>;

  constructor(private readonly options: PollLoopOptions) {
    this.log = options.log ?? createLogger('poll-loop', 'loop');
    this.done = new Promise<LoopExit>((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): LoopState {
    return this._state;
  }

  get lastCycle(): CycleSummary | null {
    return this._lastCycle;
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get cycles(): number {
    return this._cycles;
  }

  /** Run the first cycle now, then keep ticking on the configured schedule. */
  start(): void {
    if (this.started || this._state === 'halted') return;
    this.started = true;
    if (this.options.cron) {
      this.log.info({ schedule: this.options.cron }, 'Starting (cron + initial poll)');
      this.task = cron.schedule(this.options.cron, () => {
        void this.tick();
      });
    } else {
      this.log.info({ intervalMs: this.options.intervalMs }, 'Starting (interval)');
    }
    void this.tick();
  }

  /**
   * Run one cycle unless one is already running or the loop is stopping.
   * Non-fatal cycle errors are logged and the loop stays alive; fatal ones halt it.
   */
  async tick(): Promise<void> {
    if (this.stopping || this._state === 'halted') return;
    if (this._state === 'running') {
      this.log.info('Cycle already in progress, skipping tick');
      return;
    }
    this._state = 'running';
    await this.runOnce();
  }

  private async runOnce(): Promise<void> {
    this._cycles++;
    try {
      const summary = await this.exclusive(() => this.options.runCycle());
      this._lastCycle = summary;
      this._lastError = null;
      this.log.info(summary, 'Cycle complete');
    } catch (err) {
      this._lastError = errorMessage(err);
      if (isFatal(err)) {
        this.log.fatal({ err }, 'Fatal error, halting poll loop');
        this.halt({ reason: 'fatal', error: err });
        return;
      }
      this.log.error({ err }, 'Cycle failed, retrying on next tick');
    }
    this._state = 'idle';
    if (this.stopping) {
      this.halt({ reason: 'stopped' });
    } else {
      this.scheduleNext();
    }
  }

  /**
   * Run `fn` once every cycle or exclusive call queued before it has settled.
   * Its result or error is passed through; a failure does not block the lane.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.lane.then(fn);
    this.lane = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private scheduleNext(): void {
    if (!this.started || this.options.cron) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.options.intervalMs);
  }

  private halt(exit: LoopExit): void {
    this.clearSchedule();
    this._state = 'halted';
    this.settle(exit);
  }

  private clearSchedule(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  /** Stop scheduling; an in-flight cycle runs to completion first. */
  async stop(): Promise<LoopExit> {
    if (this._state === 'halted') return this.done;
    this.stopping = true;
    this.log.info({ running: this._state === 'running' }, 'Stopping poll loop');
    this.clearSchedule();
    // A running cycle halts the loop itself once it completes
    if (this._state === 'idle') this.halt({ reason: 'stopped' });
    return this.done;
  }
}
