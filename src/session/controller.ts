/**
 * Session Controller
 *
 * Runs one playback session: for every iteration it launches a fresh audio
 * player, restarts the scheduler clock, plays the whole schedule and then
 * waits for the player to finish. Repeats until the repeat count runs out.
 *
 * Cancellation (Ctrl-C) goes through cancel(): it aborts the session signal,
 * which every sleep and wait is listening to, and asks the current player to
 * stop. Nothing after that starts a new iteration.
 *
 * Events:
 *   'iteration-start'    (iteration)
 *   'iteration-complete' (iteration, outcome)
 *   'warning'            (error)    player could not be launched
 *   'cancelled'          ()
 */

import { EventEmitter } from 'events';
import type { Schedule } from '../cue-parser/types';
import { PlayerLaunchFailedError } from '../errors';
import { getLogger } from '../logger';
import type { PlayerHandle, PlayerLauncher } from '../player/types';
import { Clock, SystemClock } from '../scheduler/clock';
import { PlaybackScheduler } from '../scheduler/engine';
import type { Display, SchedulerOutcome, SchedulerTiming } from '../scheduler/types';
import { ProcessSlot } from './process-slot';
import { RepeatCount, decrementRepeat, hasRepeatsLeft } from './repeat';

const log = getLogger('Session');

export interface SessionOptions {
  schedule: Schedule;
  /** Player argv, or null to run the display alone */
  command: readonly string[] | null;
  repeat: RepeatCount;
  launcher: PlayerLauncher;
  display: Display;
  clock?: Clock;
  timing?: Partial<SchedulerTiming>;
}

export type SessionOutcome = 'completed' | 'cancelled';

export interface SessionResult {
  outcome: SessionOutcome;
  iterations: number;   // fully completed iterations
}

export type SignalName = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

/** Anything signals can be subscribed on; normally `process` */
export interface SignalSource {
  on(event: SignalName, listener: () => void): unknown;
  removeListener(event: SignalName, listener: () => void): unknown;
}

export class SessionController extends EventEmitter {
  readonly scheduler: PlaybackScheduler;
  private readonly schedule: Schedule;
  private readonly command: readonly string[] | null;
  private readonly repeat: RepeatCount;
  private readonly launcher: PlayerLauncher;
  private readonly clock: Clock;
  private readonly slot = new ProcessSlot();
  private readonly abort = new AbortController();
  private started = false;

  constructor(options: SessionOptions) {
    super();
    this.schedule = options.schedule;
    this.command = options.command;
    this.repeat = options.repeat;
    this.launcher = options.launcher;
    this.clock = options.clock ?? new SystemClock();
    this.scheduler = new PlaybackScheduler(options.display, this.clock, options.timing);
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  /** The player of the iteration in progress, if one is running */
  get currentPlayer(): PlayerHandle | null {
    return this.slot.handle;
  }

  /** Play the schedule `repeat` times, or until cancelled */
  async run(): Promise<SessionResult> {
    if (this.started) {
      throw new Error('[Session] A session can only be run once');
    }
    this.started = true;

    const signal = this.abort.signal;
    let remaining = this.repeat;
    let iterations = 0;

    while (hasRepeatsLeft(remaining) && !signal.aborted) {
      const iteration = iterations + 1;
      this.emit('iteration-start', iteration);
      log.debug({ iteration, remaining }, 'Iteration start');

      const outcome = await this.playIteration(signal);
      if (outcome === 'cancelled') break;

      iterations = iteration;
      remaining = decrementRepeat(remaining);
      this.emit('iteration-complete', iteration, outcome);

      // Let pending signal handlers in before the next iteration starts,
      // even when this one never had to wait for anything.
      if (hasRepeatsLeft(remaining) && !(await this.clock.sleep(0, signal))) break;
    }

    const outcome: SessionOutcome = signal.aborted ? 'cancelled' : 'completed';
    log.debug({ outcome, iterations }, 'Session finished');
    return { outcome, iterations };
  }

  /**
   * Stop the session: wake every pending wait and ask the current player to
   * exit. Safe to call repeatedly and from a signal handler.
   */
  cancel(): void {
    if (!this.abort.signal.aborted) {
      log.info('Cancelling session');
      this.abort.abort();
      this.emit('cancelled');
    }
    this.slot.requestTermination();
  }

  /**
   * Cancel the session on SIGINT/SIGTERM/SIGHUP. The player runs detached, so
   * a terminal hangup never reaches it directly. Returns a function that
   * removes the handlers again.
   */
  bindSignals(source: SignalSource, signals: readonly SignalName[] = ['SIGINT', 'SIGTERM', 'SIGHUP']): () => void {
    const onSignal = (): void => this.cancel();
    for (const name of signals) {
      source.on(name, onSignal);
    }
    return () => {
      for (const name of signals) {
        source.removeListener(name, onSignal);
      }
    };
  }

  // --- Internal ---

  private async playIteration(signal: AbortSignal): Promise<SchedulerOutcome> {
    const player = await this.launchPlayer();
    this.slot.set(player);
    let finished = false;

    try {
      // cancel() may have fired while the player was starting
      if (signal.aborted) return 'cancelled';

      const clockStart = this.clock.now();
      const outcome = await this.scheduler.run(this.schedule, clockStart, signal);
      if (outcome === 'cancelled') return 'cancelled';

      if (player && player.isAlive()) {
        log.debug('Display finished, waiting for player to exit');
        if ((await player.waitForExit(signal)) === 'cancelled') return 'cancelled';
      }
      finished = true;
      return outcome;
    } finally {
      // Cancelled or failed: stop the detached player
      if (!finished) this.slot.requestTermination();
      this.slot.clear();
    }
  }

  /** Launch failures are not fatal: the lyrics still run, just without audio */
  private async launchPlayer(): Promise<PlayerHandle | null> {
    if (!this.command) return null;

    try {
      return await this.launcher.launch(this.command);
    } catch (err) {
      if (err instanceof PlayerLaunchFailedError) {
        log.warn({ command: err.command }, `${err.message}; continuing without audio`);
        this.emit('warning', err);
        return null;
      }
      throw err;
    }
  }
}
