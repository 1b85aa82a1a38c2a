/**
 * Process slot
 *
 * The one place the current player handle lives. The session loop swaps it
 * per iteration; the interrupt path only ever calls requestTermination(),
 * which is safe to call any number of times from either side.
 */

import type { PlayerHandle } from '../player/types';

export class ProcessSlot {
  private current: PlayerHandle | null = null;

  get handle(): PlayerHandle | null {
    return this.current;
  }

  set(handle: PlayerHandle | null): void {
    this.current = handle;
  }

  clear(): void {
    this.current = null;
  }

  /** True if a termination request went out on this call */
  requestTermination(): boolean {
    const handle = this.current;
    if (!handle || !handle.isAlive()) return false;
    return handle.terminate();
  }
}
