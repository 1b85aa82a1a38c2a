/**
 * Repeat counts
 *
 * Configuration uses 0 for "until interrupted"; inside the session that is
 * the explicit 'infinite' sentinel so it can never be mistaken for zero plays.
 */

export type RepeatCount = number | 'infinite';

export function toRepeatCount(configured: number): RepeatCount {
  if (!Number.isSafeInteger(configured) || configured < 0) {
    throw new RangeError(`Repeat count must be a non-negative integer, got ${configured}`);
  }
  return configured === 0 ? 'infinite' : configured;
}

/** Remaining count after one finished iteration */
export function decrementRepeat(remaining: RepeatCount): RepeatCount {
  return remaining === 'infinite' ? remaining : remaining - 1;
}

export function hasRepeatsLeft(remaining: RepeatCount): boolean {
  return remaining === 'infinite' || remaining > 0;
}

export function describeRepeat(count: RepeatCount): string {
  if (count === 'infinite') return 'until interrupted';
  return count === 1 ? 'once' : `${count} times`;
}
