/**
 * Clocks
 *
 * The scheduler reads time and sleeps only through a Clock, so tests can
 * swap in VirtualClock and run a five-minute song in microseconds.
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { setTimeout as sleepFor } from 'node:timers/promises';
import { isAbortError } from '../cancellation';

export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
  /** Resolves true after `ms`, or false as soon as `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    try {
      await sleepFor(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (isAbortError(error)) return false;
      throw error;
    }
  }
}

/**
 * Simulated clock. Time only moves when something sleeps (or when `advance`
 * is called); each sleep emits `tick` with the new time, after which the
 * signal is checked again. A `tick` listener that aborts therefore cancels
 * the sleep that reached that moment.
 */
export class VirtualClock extends EventEmitter implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(startMs = 0) {
    super();
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    this.sleeps.push(ms);
    this.current += ms;
    this.emit('tick', this.current);
    await Promise.resolve();
    return !signal?.aborted;
  }
}
