/**
 * Playback Scheduler Types
 */

/** Polling intervals for the display loop, in milliseconds */
export interface SchedulerTiming {
  countdownPollMs: number;   // countdown redraw interval
  cuePollMs: number;         // wait granularity while a cue is pending
  finalHoldMs: number;       // keep the last line up before finishing
}

export const DEFAULT_TIMING: Readonly<SchedulerTiming> = {
  countdownPollMs: 100,
  cuePollMs: 50,
  finalHoldMs: 500,
};

export type SchedulerPhase =
  | 'idle'
  | 'precountdown'
  | 'countdown'
  | 'cue'
  | 'done'
  | 'cancelled';

export type SchedulerOutcome = 'completed' | 'empty' | 'cancelled';

/** Where cues and countdown numbers end up */
export interface Display {
  /** Replace whatever is on screen with `text` */
  show(text: string): void;
  /** Print a plain status line */
  notice(text: string): void;
}
