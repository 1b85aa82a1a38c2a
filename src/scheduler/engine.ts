/**
 * Playback Scheduler
 *
 * Real-time display loop for one play-through:
 *
 *   precountdown -> countdown -> cue(0) -> ... -> cue(last) -> done
 *
 * with `cancelled` reachable from any running phase. Time is polled, not
 * scheduled: the loop sleeps for a short fixed interval and re-reads the
 * clock, which keeps cue order trivially correct when the process stalls.
 * A cue whose time has already passed is shown immediately and the loop
 * moves on to the next one; nothing is ever skipped.
 *
 * Events:
 *   'phase'     (phase)
 *   'countdown' (seconds)              one per redraw
 *   'cue'       (index, cue, elapsedMs)
 */

import { EventEmitter } from 'events';
import type { Schedule } from '../cue-parser/types';
import { getLogger } from '../logger';
import { Clock, SystemClock } from './clock';
import { DEFAULT_TIMING, Display, SchedulerOutcome, SchedulerPhase, SchedulerTiming } from './types';

const log = getLogger('Scheduler');

export const EMPTY_SCHEDULE_NOTICE = 'No lyrics to display.';

export class PlaybackScheduler extends EventEmitter {
  private readonly display: Display;
  private readonly clock: Clock;
  private readonly timing: SchedulerTiming;
  private currentPhase: SchedulerPhase = 'idle';
  private running = false;

  constructor(display: Display, clock: Clock = new SystemClock(), timing: Partial<SchedulerTiming> = {}) {
    super();
    this.display = display;
    this.clock = clock;
    this.timing = { ...DEFAULT_TIMING, ...timing };
  }

  get phase(): SchedulerPhase {
    return this.currentPhase;
  }

  /**
   * Drive the display through `schedule`, measuring elapsed time from
   * `clockStart` (a reading of this scheduler's clock).
   */
  async run(schedule: Schedule, clockStart: number, signal?: AbortSignal): Promise<SchedulerOutcome> {
    if (this.running) {
      throw new Error('[Scheduler] run() called while a play-through is in progress');
    }
    this.running = true;
    try {
      return await this.playThrough(schedule, clockStart, signal);
    } finally {
      this.running = false;
    }
  }

  // --- Internal ---

  private async playThrough(schedule: Schedule, clockStart: number, signal?: AbortSignal): Promise<SchedulerOutcome> {
    if (schedule.length === 0) {
      this.display.notice(EMPTY_SCHEDULE_NOTICE);
      this.setPhase('done');
      return 'empty';
    }

    this.setPhase('precountdown');
    if (!(await this.countdown(schedule[0].timestamp * 1000, clockStart, signal))) {
      return this.cancelled();
    }

    this.setPhase('cue');
    for (let index = 0; index < schedule.length; index++) {
      const cue = schedule[index];
      const elapsed = await this.waitUntil(cue.timestamp * 1000, clockStart, signal);
      if (elapsed === null) return this.cancelled();

      this.display.show(cue.text);
      this.emit('cue', index, cue, elapsed);
      log.debug({ index, at: cue.timestamp, elapsedMs: Math.round(elapsed) }, 'Cue');
    }

    if (!(await this.clock.sleep(this.timing.finalHoldMs, signal))) {
      return this.cancelled();
    }

    this.setPhase('done');
    return 'completed';
  }

  /** Redraw the whole-second countdown until the first cue is due. False if cancelled. */
  private async countdown(firstCueMs: number, clockStart: number, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) return false;

      const remaining = firstCueMs - (this.clock.now() - clockStart);
      if (remaining <= 0) return true;

      if (this.currentPhase !== 'countdown') this.setPhase('countdown');
      const seconds = Math.ceil(remaining / 1000);
      this.display.show(String(seconds));
      this.emit('countdown', seconds);

      if (!(await this.clock.sleep(this.timing.countdownPollMs, signal))) return false;
    }
  }

  /** Poll until elapsed >= dueMs. Resolves with the elapsed reading, or null if cancelled. */
  private async waitUntil(dueMs: number, clockStart: number, signal?: AbortSignal): Promise<number | null> {
    for (;;) {
      if (signal?.aborted) return null;

      const elapsed = this.clock.now() - clockStart;
      if (elapsed >= dueMs) return elapsed;

      if (!(await this.clock.sleep(this.timing.cuePollMs, signal))) return null;
    }
  }

  private cancelled(): SchedulerOutcome {
    this.setPhase('cancelled');
    return 'cancelled';
  }

  private setPhase(phase: SchedulerPhase): void {
    this.currentPhase = phase;
    this.emit('phase', phase);
  }
}
