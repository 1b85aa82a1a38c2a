/**
 * Player Types
 *
 * The session only talks to audio through these interfaces, so the real
 * child-process supervisor and test fakes are interchangeable.
 */

import type { EventEmitter } from 'events';

export type ExitWaitResult = 'exited' | 'cancelled';

/** A running (or finished) audio player */
export interface PlayerHandle {
  readonly command: readonly string[];
  /** Non-blocking liveness poll */
  isAlive(): boolean;
  /** Resolve on exit, or with 'cancelled' once `signal` aborts */
  waitForExit(signal?: AbortSignal): Promise<ExitWaitResult>;
  /**
   * Ask the player to stop. Idempotent; returns true only for the call that
   * actually sent the request.
   */
  terminate(): boolean;
}

/** Starts one player process per call; rejects with PlayerLaunchFailedError */
export interface PlayerLauncher {
  launch(command: readonly string[]): Promise<PlayerHandle>;
}

/**
 * The slice of ChildProcess the supervisor relies on. Events used:
 * 'spawn', 'error' (err), 'exit' (code, signal).
 */
export interface PlayerChild extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnPlayer = (file: string, args: readonly string[]) => PlayerChild;
