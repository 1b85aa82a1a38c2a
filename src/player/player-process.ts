/**
 * Player Process
 *
 * PlayerHandle over a spawned child. Exit is observed once, through the
 * child's 'exit' event; termination is requested at most once.
 */

import { raceAbort } from '../cancellation';
import { getLogger } from '../logger';
import { ExitWaitResult, PlayerChild, PlayerHandle } from './types';

const log = getLogger('Player');

export interface PlayerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export class PlayerProcess implements PlayerHandle {
  readonly command: readonly string[];
  private readonly child: PlayerChild;
  private readonly exited: Promise<PlayerExit>;
  private exitInfo: PlayerExit | null = null;
  private terminationRequested = false;

  constructor(child: PlayerChild, command: readonly string[]) {
    this.child = child;
    this.command = command;

    this.exited = new Promise<PlayerExit>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        this.exitInfo = { code: child.exitCode, signal: child.signalCode };
        resolve(this.exitInfo);
        return;
      }
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitInfo = { code, signal };
        log.debug({ pid: child.pid, code, signal }, 'Player exited');
        resolve(this.exitInfo);
      });
    });

    // After a successful spawn, 'error' only reports failed kill/IPC calls.
    child.on('error', (err: Error) => {
      log.warn({ pid: child.pid, err: err.message }, 'Player process error');
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Exit details once the process has exited, null while it runs */
  get exit(): PlayerExit | null {
    return this.exitInfo;
  }

  isAlive(): boolean {
    return this.exitInfo === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  async waitForExit(signal?: AbortSignal): Promise<ExitWaitResult> {
    const result = await raceAbort(this.exited, signal);
    return result === 'cancelled' ? 'cancelled' : 'exited';
  }

  terminate(): boolean {
    if (this.terminationRequested || !this.isAlive()) return false;
    this.terminationRequested = true;

    try {
      const sent = this.child.kill('SIGTERM');
      log.debug({ pid: this.child.pid, sent }, 'Requested player termination');
      return sent;
    } catch (err) {
      // Racing a natural exit; nothing left to stop.
      log.debug({ pid: this.child.pid, err: err instanceof Error ? err.message : String(err) }, 'Terminate failed');
      return false;
    }
  }
}
